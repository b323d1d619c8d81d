/**
 * vite.config.ts
 *
 * Vite configuration for the dashboard. The dev server proxies the API,
 * image and metrics routes to the backend, so the client can use relative
 * URLs without CORS during development. `vite build` writes to `public/`
 * at the repository root, which the backend serves as static files.
 */

import {fileURLToPath} from "node:url";
import {defineConfig} from "vite";
import tailwindcss from "@tailwindcss/vite";

const BACKEND = process.env.VITE_BACKEND_URL ?? "http://localhost:8080";

export default defineConfig({
    root: fileURLToPath(new URL(".", import.meta.url)),
    build: {
        outDir: fileURLToPath(new URL("../public", import.meta.url)),
        emptyOutDir: true,
    },
    server: {
        port: 5173,
        host: true,
        proxy: {
            "/api": {target: BACKEND, changeOrigin: true},
            "/images": {target: BACKEND, changeOrigin: true},
            "/metrics": {target: BACKEND, changeOrigin: true},
        },
    },
    plugins: [tailwindcss()],
});
