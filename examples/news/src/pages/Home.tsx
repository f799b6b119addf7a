import { createPath } from "hearthjs-core/runtime";
import { Link, useSelector } from "hearthjs-adapter-react";
import type { NewsState } from "../store.js";

export default function Home() {
  const topIds = useSelector((state: NewsState) => state.topIds);
  const stories = useSelector((state: NewsState) => state.stories);

  return (
    <section>
      <h1>Top stories</h1>
      <ul style={{ listStyle: "none", padding: 0 }}>
        {topIds.map((id) => (
          <li key={id} style={{ marginBottom: "1.5rem" }}>
            <Link to={createPath("/stories/:id", { id })} style={{ color: "#111827", fontWeight: 600 }}>
              {stories[id].title}
            </Link>
            <p style={{ margin: "0.25rem 0", color: "#6b7280" }}>{stories[id].summary}</p>
          </li>
        ))}
      </ul>
    </section>
  );
}
