import { defineConfig } from "hearthjs-shared";

export default defineConfig({
  app: "src/app.tsx",
  client: "src/client.tsx",
  server: {
    port: 3000,
  },
  build: {
    sourcemap: true,
  },
});
