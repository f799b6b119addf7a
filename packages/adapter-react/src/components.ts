import { createElement, Fragment, useContext, useEffect, useRef } from "react";
import type { AnchorHTMLAttributes, MouseEvent, ReactElement, ReactNode } from "react";
import type { HeadAttributes, HeadTag } from "hearthjs-shared";
import { HeadContext, RouteContext, RouterContext } from "./context.js";
import { declareHead, mountHead } from "./client-head.js";
import type { HeadDeclaration } from "./client-head.js";

// ─── Link ─────────────────────────────────────────────────────────────────────

export interface LinkProps extends Omit<AnchorHTMLAttributes<HTMLAnchorElement>, "href"> {
  to: string;
  replace?: boolean;
}

/** Paths on this origin; protocol-relative URLs are not. */
function isInternal(to: string): boolean {
  return to.startsWith("/") && !to.startsWith("//");
}

function isPlainLeftClick(event: MouseEvent<HTMLAnchorElement>): boolean {
  return (
    event.button === 0 &&
    !event.metaKey &&
    !event.altKey &&
    !event.ctrlKey &&
    !event.shiftKey
  );
}

/**
 * An `<a href>` that navigates through the client router when clicked,
 * and is an ordinary link before hydration and without JavaScript.
 */
export function Link({ to, replace, onClick, ...rest }: LinkProps): ReactElement {
  const router = useContext(RouterContext);

  const handleClick = (event: MouseEvent<HTMLAnchorElement>) => {
    onClick?.(event);
    if (!router || event.defaultPrevented) return;
    if (!isPlainLeftClick(event)) return;
    if (rest.target && rest.target !== "_self") return;
    if (!isInternal(to)) return;

    event.preventDefault();
    void router.navigate(to, { replace });
  };

  return createElement("a", { ...rest, href: to, onClick: handleClick });
}

// ─── Redirect / Status ────────────────────────────────────────────────────────

export interface RedirectProps {
  to: string;
  status?: number;
}

/**
 * On the server, answer the request with a redirect instead of this page.
 * In the browser, navigate (replacing the entry) once mounted.
 */
export function Redirect({ to, status = 302 }: RedirectProps): null {
  const router = useContext(RouterContext);
  if (router?.staticContext) {
    router.staticContext.redirect ??= { url: to, status };
  }

  const navigate = router?.navigate;
  useEffect(() => {
    if (navigate) void navigate(to, { replace: true });
  }, [navigate, to]);

  return null;
}

export interface StatusProps {
  code: number;
  children?: ReactNode;
}

/** Set the HTTP status of the server response, e.g. 404 for a not-found page. */
export function Status({ code, children }: StatusProps): ReactElement {
  const router = useContext(RouterContext);
  if (router?.staticContext) {
    router.staticContext.status = code;
  }
  return createElement(Fragment, null, children);
}

// ─── Head ─────────────────────────────────────────────────────────────────────

export interface HeadScript {
  attributes?: HeadAttributes;
  content?: string;
}

export interface HeadProps {
  title?: string;
  meta?: HeadAttributes[];
  link?: HeadAttributes[];
  script?: HeadScript[];
  htmlAttributes?: HeadAttributes;
  bodyAttributes?: HeadAttributes;
}

export function toHeadDeclaration(props: HeadProps): HeadDeclaration {
  const tags: HeadTag[] = [
    ...(props.meta ?? []).map((attributes): HeadTag => ({ tag: "meta", attributes })),
    ...(props.link ?? []).map((attributes): HeadTag => ({ tag: "link", attributes })),
    ...(props.script ?? []).map(
      (script): HeadTag => ({ tag: "script", attributes: script.attributes, content: script.content }),
    ),
  ];
  return {
    title: props.title,
    tags,
    htmlAttributes: props.htmlAttributes,
    bodyAttributes: props.bodyAttributes,
  };
}

/**
 * Declare document head tags. Rendered on the server they end up in the
 * document head; in the browser they are applied after mount and removed
 * again on unmount.
 */
export function Head(props: HeadProps): null {
  const collector = useContext(HeadContext);
  const route = useContext(RouteContext);
  const depth = route ? route.depth : -1;

  if (collector) {
    declareHead(collector, toHeadDeclaration(props));
  }

  const latest = useRef(props);
  latest.current = props;

  // Keyed by value: re-renders with equal props leave the document alone
  const serialized = JSON.stringify(props);
  useEffect(() => {
    return mountHead(document, depth, toHeadDeclaration(latest.current));
  }, [depth, serialized]);

  return null;
}
