import express, { type Express } from "express";
import cors from "cors";
import type { AppConfig } from "./config.js";
import type { AiGateway } from "./ai/gateway.js";
import { createAiRouter } from "./api/ai.js";
import { createDashboardRouter } from "./api/dashboard.js";
import { createProgressRouter } from "./api/progress.js";
import { errorHandler, notFoundHandler, requestLogger } from "./helpers/http-response.js";
import { ProgressService } from "./services/progress-service.js";
import { GenerationLog } from "./store/generation-log.js";
import { TaskStore } from "./store/task-store.js";

export const APP_VERSION = "1.0.0";

export interface AppDeps {
  config: Pick<AppConfig, "allowedOrigins" | "env">;
  gateway: AiGateway;
  store?: TaskStore;
  log?: GenerationLog;
}

/**
 * Builds the Express app around explicitly owned state. Nothing is a module
 * singleton: each call gets its own store and log unless they are passed in.
 */
export function createApp({ config, gateway, store = new TaskStore(), log = new GenerationLog() }: AppDeps): Express {
  const progress = new ProgressService(store);

  const app = express();
  app.set("trust proxy", 1);
  app.use(cors({
    origin: config.allowedOrigins,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  }));
  app.use(express.json({ limit: "100kb" }));
  if (config.env !== "test") {
    app.use(requestLogger());
  }

  app.get("/", (_req, res) => {
    res.json({ message: "Rehab Dashboard API", version: APP_VERSION, status: "running" });
  });

  // Health check
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api", createDashboardRouter(store));
  app.use("/api", createProgressRouter(progress));
  app.use("/api/ai", createAiRouter({ gateway, log, store }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
