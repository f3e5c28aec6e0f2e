import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";

// https://vite.dev/config/
export default defineConfig({
  plugins: [react()],
  build: {
    outDir: "dist/web",
    rollupOptions: {
      output: {
        manualChunks: {
          "react-vendor": ["react", "react-dom"],
          "xstate-vendor": ["xstate", "@xstate/react"],
        },
      },
    },
    sourcemap: false,
    minify: "esbuild",
  },
});
