import { defineConfig } from "vite";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  build: {
    lib: {
      entry: resolve(__dirname, "src/index.ts"),
      fileName: "mtl-reader",
      formats: ["es", "cjs"],
    },
    outDir: "dist",
    sourcemap: true,
    minify: false,
    // Node 端库，不打包内置模块
    ssr: true,
    target: "node20",
    rollupOptions: {
      external: [/^node:/],
      output: {
        preserveModules: false,
      },
    },
  },
});
