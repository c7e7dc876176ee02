import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import tailwindcss from "@tailwindcss/vite";

// https://vite.dev/config/
export default defineConfig({
  plugins: [
    react(),
    tailwindcss(),
  ],
  base: process.env.BASE_PATH || '/',
  server: {
    host: '0.0.0.0',
    proxy: {
      // Lets VITE_GATEWAY_URL=/gateway reach a gateway on another port during development
      '/gateway': {
        target: process.env.GATEWAY_PROXY_TARGET || 'http://localhost:8080',
        changeOrigin: true,
        rewrite: (path) => path.replace(/^\/gateway/, ''),
      },
    },
  },
})
