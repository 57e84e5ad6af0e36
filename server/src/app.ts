import express from "express";
import type { ErrorBody } from "./types/launch.js";

export function createApp() {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => {
    res.json({
      status: "ok",
      now: new Date().toISOString(),
    });
  });

  app.use((req: express.Request, res: express.Response) => {
    const body: ErrorBody = {
      errorCode: "NOT_FOUND",
      errorMessage: `${req.method} ${req.path} not found`,
    };
    res.status(404).json(body);
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const body: ErrorBody = {
      errorCode: "INTERNAL_ERROR",
      errorMessage: err instanceof Error ? err.message : "Unknown error",
    };
    res.status(500).json(body);
  });

  return app;
}
