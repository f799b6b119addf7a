import { Head, Link, Status, useLocation } from "hearthjs-adapter-react";

export default function NotFound() {
  const { pathname } = useLocation();

  return (
    <Status code={404}>
      <Head title="Page not found" />
      <h1>Page not found</h1>
      <p>
        Nothing lives at <code>{pathname}</code>.
      </p>
      <Link to="/">Go to the front page</Link>
    </Status>
  );
}
