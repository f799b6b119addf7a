import { hydrate } from "hearthjs-adapter-react/client";
import app from "./app.js";

hydrate(app);
