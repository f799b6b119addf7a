import type { RouteComponentProps } from "hearthjs-adapter-react";
import { Head, Link, Status, useSelector } from "hearthjs-adapter-react";
import type { NewsState } from "../store.js";

export default function StoryPage({ params }: RouteComponentProps) {
  const story = useSelector((state: NewsState) => state.stories[params.id]);

  if (!story) {
    return (
      <Status code={404}>
        <Head title="Story not found" />
        <h1>Story not found</h1>
        <Link to="/">&larr; Back to the front page</Link>
      </Status>
    );
  }

  return (
    <article>
      <Head title={story.title} meta={[{ name: "description", content: story.summary }]} />
      <h1>{story.title}</h1>
      <div style={{ fontSize: "0.875rem", color: "#9ca3af", marginBottom: "2rem" }}>
        <span>{story.author}</span> &middot; <time>{story.publishedAt}</time>
      </div>
      {story.body.split("\n\n").map((paragraph, i) => (
        <p key={i} style={{ lineHeight: 1.7, color: "#374151" }}>{paragraph}</p>
      ))}
      <Link to="/" style={{ color: "#b45309" }}>&larr; Back to the front page</Link>
    </article>
  );
}
