import type { RouteComponentProps } from "hearthjs-adapter-react";
import { Head, Link, useNavigationState } from "hearthjs-adapter-react";

export default function Layout({ children }: RouteComponentProps) {
  const navigation = useNavigationState();

  return (
    <div style={{ fontFamily: "system-ui, -apple-system, sans-serif", maxWidth: "760px", margin: "0 auto" }}>
      <Head
        title="Hearth News"
        meta={[{ name: "description", content: "Local news, rendered on the server." }]}
        link={[{ rel: "icon", href: "/favicon.svg" }]}
        htmlAttributes={{ lang: "en" }}
      />
      <header style={{ padding: "1rem 0", borderBottom: "2px solid #e5e7eb" }}>
        <nav style={{ display: "flex", alignItems: "center", gap: "1.5rem" }}>
          <Link to="/" style={{ fontSize: "1.25rem", fontWeight: "bold", textDecoration: "none", color: "#b45309" }}>
            Hearth News
          </Link>
          <Link to="/about" style={{ textDecoration: "none", color: "#6b7280" }}>About</Link>
          {navigation === "loading" && <span style={{ marginLeft: "auto", color: "#9ca3af" }}>Loading…</span>}
        </nav>
      </header>
      <main style={{ padding: "2rem 0" }}>{children}</main>
    </div>
  );
}
