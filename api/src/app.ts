// api/src/app.ts
import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import { buildRoutes, type RouteDeps } from "./routes.js";

export type AppOptions = RouteDeps & {
  jsonLimit: string;
  logRequests?: boolean;
};

export function createApp(opts: AppOptions) {
  const app = express();

  // Trust reverse proxies (load balancers)
  app.set("trust proxy", 1);

  app.use(express.json({ limit: opts.jsonLimit }));

  if (opts.logRequests ?? true) {
    app.use((req, _res, next) => {
      console.log(`${req.method} ${req.path}`);
      next();
    });
  }

  app.use(
    cors({
      origin: true,
      credentials: true,
    })
  );

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, service: "budget-variance-api", llm: opts.chat ? "configured" : "disabled" });
  });

  app.use("/api", buildRoutes(opts));

  // Body parser failures (bad JSON, payload too large) land here
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    const status = typeof err?.status === "number" ? err.status : 500;
    if (status >= 500) console.error("[app] unhandled error:", err);
    res.status(status).json({ ok: false, error: err instanceof Error ? err.message : String(err) });
  };
  app.use(onError);

  return app;
}
