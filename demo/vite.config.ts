import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import path from "node:path";
import { fileURLToPath } from "node:url";

const demoDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  root: demoDir,
  plugins: [react()],
  resolve: {
    alias: {
      inklayer: path.resolve(demoDir, "../src/index.ts"),
    },
    dedupe: ["react", "react-dom"],
  },
  server: {
    host: true,
    port: 5174,
    fs: {
      allow: [path.resolve(demoDir, "..")],
    },
  },
});
