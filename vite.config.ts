import { defineConfig } from "vite";
import react from "@vitejs/plugin-react";
import { profileDevPlugin } from "./vite.profileDevPlugin";

export default defineConfig({
  plugins: [react(), profileDevPlugin()]
});
