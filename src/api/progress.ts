import { Router } from "express";
import { parseTaskId, type ProgressService } from "../services/progress-service.js";
import { safeHandler } from "../helpers/http-response.js";

export function createProgressRouter(progress: ProgressService): Router {
  const router = Router();

  // POST /api/progress/complete/:taskId
  router.post("/progress/complete/:taskId", safeHandler((req, res) => {
    const taskId = parseTaskId(req.params.taskId);
    res.json(progress.completeTask(taskId));
  }));

  return router;
}
