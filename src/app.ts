// src/app.ts
import express, { type ErrorRequestHandler, type Router } from "express";
import cors from "cors";
import cookieParser from "cookie-parser";

import type { AppConfig } from "./config";
import { errorMessage, statusOf } from "./errors";
import type { TextGenerator } from "./services/llm";
import { SessionStore } from "./services/session";
import { pagesRouter } from "./routes/pages";
import { uploadRouter } from "./routes/upload";
import { downloadRouter } from "./routes/download";

export type AppDeps = {
  config: AppConfig;
  llm: TextGenerator;
  store?: SessionStore;
};

export function createApp({ config, llm, store = new SessionStore(config.resultStoreLimit) }: AppDeps) {
  const app = express();
  app.set("trust proxy", 1);

  app.use(cookieParser());
  app.use(express.urlencoded({ extended: false }));
  app.use(express.json({ limit: "1mb" }));

  // mount and log the path
  function mount(path: string, router: Router) {
    app.use(path, router);
    console.log(`[Mount] ${path}`);
  }

  app.get("/health", (_req, res) => res.json({ ok: true, env: config.env }));

  // CORS only matters for the JSON API; the HTML pages are same-origin
  const allowedOrigins = [config.frontendUrl].filter(Boolean);
  const api = express.Router();
  api.use(
    cors({
      origin: (origin, cb) => {
        // no origin (curl, server-to-server) -> allow
        if (!origin) return cb(null, true);
        if (allowedOrigins.includes(origin)) return cb(null, true);
        console.warn("[CORS] blocked origin:", origin);
        return cb(null, false);
      },
      optionsSuccessStatus: 204,
    })
  );
  api.use(uploadRouter({ config, llm, store }));

  mount("/", pagesRouter({ config, llm, store }));
  mount("/", downloadRouter({ store }));
  mount("/api", api);

  app.use((req, res) => {
    res.status(404).json({ ok: false, error: `Route ${req.method} ${req.path} does not exist` });
  });

  const lastResort: ErrorRequestHandler = (err, req, res, _next) => {
    console.error("[app] unhandled error:", { path: req.path, error: errorMessage(err) });
    res.status(statusOf(err)).json({ ok: false, error: errorMessage(err) });
  };
  app.use(lastResort);

  return app;
}
