import { defineConfig, type Plugin } from "vite";
import react from "@vitejs/plugin-react";
import path from "path";
import { fileURLToPath } from "url";

const webDir = path.dirname(fileURLToPath(import.meta.url));
const staticDir = path.resolve(webDir, "../bff/static");

/**
 * Writes the `manifest.json` the BFF reads to find the hashed bundle:
 * `{ "app.js": "/assets/app.<hash>.js", "app.css": ... }`.
 */
function assetManifest(): Plugin {
  return {
    name: "bff-asset-manifest",
    generateBundle(_options, bundle) {
      const manifest: Record<string, string> = {};

      for (const output of Object.values(bundle)) {
        if (output.type === "chunk" && output.isEntry) {
          manifest["app.js"] = `/${output.fileName}`;
        }
        if (output.type === "asset" && output.fileName.endsWith(".css")) {
          manifest["app.css"] = `/${output.fileName}`;
        }
      }

      this.emitFile({
        type: "asset",
        fileName: "manifest.json",
        source: JSON.stringify(manifest, null, 2),
      });
    },
  };
}

/**
 * Browser bundle for the BFF to serve. Output lands in apps/bff/static next
 * to the page templates, which are left in place.
 */
export default defineConfig({
  plugins: [react(), assetManifest()],
  define: {
    "process.env.NODE_ENV": JSON.stringify("production"),
  },
  build: {
    outDir: staticDir,
    emptyOutDir: false,
    rollupOptions: {
      input: path.resolve(webDir, "src/main.tsx"),
      output: {
        entryFileNames: "assets/app.[hash].js",
        chunkFileNames: "assets/[name].[hash].js",
        assetFileNames: "assets/[name].[hash][extname]",
      },
    },
  },
});
