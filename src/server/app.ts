import express, { type NextFunction, type Request, type Response } from "express";
import { createApiRouter, type RoutesDeps } from "./routes.js";

export function createApp(deps: RoutesDeps): express.Express {
  const app = express();

  app.use(express.json());

  app.use("/api", createApiRouter(deps));

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    deps.logger.error({ error: message }, "Unhandled request error");
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
