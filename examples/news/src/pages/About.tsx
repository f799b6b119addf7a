import { Head } from "hearthjs-adapter-react";

export default function About() {
  return (
    <section>
      <Head title="About" meta={[{ name: "description", content: "Who writes Hearth News." }]} />
      <h1>About</h1>
      <p>Hearth News is a small demo: every page is rendered on the server, then hydrated and routed in the browser.</p>
    </section>
  );
}
