import tailwindcss from "@tailwindcss/vite";
import react from "@vitejs/plugin-react-swc";
import { defineConfig } from "vite";
import tsconfigPaths from "vite-tsconfig-paths";

const { BASE_URL = "/" } = process.env;

export default defineConfig({
  base: BASE_URL,
  plugins: [react(), tsconfigPaths(), tailwindcss()],
  worker: { format: "es" },
});
