import { Router } from "express";
import type { TaskStore } from "../store/task-store.js";
import { safeHandler } from "../helpers/http-response.js";

export function createDashboardRouter(store: TaskStore): Router {
  const router = Router();

  // GET /api/dashboard — everything the main page renders
  router.get("/dashboard", safeHandler((_req, res) => {
    res.json(store.dashboard());
  }));

  return router;
}
