export { createReactAdapter } from "./adapter.js";
export { HearthRoot, RouteOutlet } from "./root.js";
export type { HearthRootProps } from "./root.js";
export { Link, Redirect, Status, Head, toHeadDeclaration } from "./components.js";
export type { LinkProps, RedirectProps, StatusProps, HeadProps, HeadScript } from "./components.js";
export {
  useStore,
  useSelector,
  useDispatch,
  useLocation,
  useNavigate,
  useNavigationState,
  useParams,
  useRouteData,
} from "./hooks.js";
export { toRenderedRoutes } from "./context.js";
export type {
  RouteComponentProps,
  HearthComponent,
  HearthLocation,
  NavigateOptions,
  NavigateFunction,
  NavigationState,
  RenderedRoute,
  RouterContextValue,
} from "./context.js";
