import type { IncomingMessage, ServerResponse } from "http";
import type { PluginOption } from "vite";
import profileHandler from "./api/profile";

export const profileDevPlugin = (): PluginOption => ({
  name: "profile-dev-endpoint",
  configureServer(server) {
    server.middlewares.use("/api/profile", (req: IncomingMessage, res: ServerResponse) => {
      profileHandler(req, res).catch((error: unknown) => {
        // surface the error in dev for visibility
        console.error("[profile] dev handler error", error);
        res.statusCode = 500;
        res.end(
          JSON.stringify({
            ok: false,
            error: "Dev handler error",
            requestId: "dev"
          })
        );
      });
    });
  }
});
