import { Redirect } from "hearthjs-adapter-react";

/** /old-about moved to /about. */
export default function OldAbout() {
  return <Redirect to="/about" status={301} />;
}
