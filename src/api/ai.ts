import { Router } from "express";
import { z } from "zod";
import { validateTaskNames, type AiGateway } from "../ai/gateway.js";
import { AppError, InvalidInputError, NotFoundError } from "../errors.js";
import { classifyError, safeHandler } from "../helpers/http-response.js";
import type { GenerationLog } from "../store/generation-log.js";
import type { ScheduledSlot } from "../store/types.js";
import type { TaskStore } from "../store/task-store.js";

export const FALLBACK_STORY = "Unable to generate story at this time. Remember: every small step counts.";

const scheduleRequestSchema = z.object({
  tasks: z.unknown(),
  user_profile: z
    .object({
      preferred_wake_time: z.string().max(20).optional(),
      activity_level: z.string().max(50).optional(),
    })
    .optional(),
});

const historyQuerySchema = z.object({
  type: z.enum(["story", "schedule"]).optional(),
});

export interface AiRouterDeps {
  gateway: AiGateway;
  log: GenerationLog;
  store: TaskStore;
}

export function createAiRouter({ gateway, log, store }: AiRouterDeps): Router {
  const router = Router();

  // GET /api/ai/vibestory — a short story for text-to-speech
  router.get("/vibestory", safeHandler(async (_req, res) => {
    try {
      const overallProgress = store.overallProgress();
      const storyText = await gateway.generateStory({ overallProgress });
      const record = log.recordStory(storyText, { overallProgress });
      res.json({
        storyText,
        storyId: record.id,
        wordCount: record.wordCount,
        success: true,
      });
    } catch (err) {
      const { status, body } = classifyError(err);
      log.recordFailure("story", body.code, body.error);
      if (err instanceof AppError) {
        console.warn(`[vibestory] ${body.code}: ${body.error}`);
      } else {
        console.error("[vibestory] Unhandled error:", err instanceof Error ? err.stack : err);
      }
      res.status(status).json({ ...body, storyText: FALLBACK_STORY });
    }
  }));

  // POST /api/ai/generateschedule — { tasks: string[], user_profile? }
  router.post("/generateschedule", safeHandler(async (req, res) => {
    const parsed = scheduleRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      const errors = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
      throw new InvalidInputError(`Invalid request body: ${errors.join(", ")}`);
    }
    if (parsed.data.tasks === undefined) {
      throw new InvalidInputError("Missing 'tasks' field in request body");
    }

    const tasks = validateTaskNames(parsed.data.tasks);
    const profile = parsed.data.user_profile;
    let schedule: ScheduledSlot[];
    try {
      schedule = await gateway.generateSchedule(tasks, {
        preferredWakeTime: profile?.preferred_wake_time,
        activityLevel: profile?.activity_level,
      });
    } catch (err) {
      const { body } = classifyError(err);
      log.recordFailure("schedule", body.code, body.error);
      throw err;
    }
    const record = log.recordSchedule(schedule, tasks);

    res.json({
      schedule,
      scheduleId: record.id,
      taskCount: record.taskCount,
      success: true,
    });
  }));

  // GET /api/ai/stories/:id
  router.get("/stories/:id", safeHandler((req, res) => {
    const record = log.get("story", req.params.id);
    if (!record) throw new NotFoundError(`Story ${req.params.id} not found`);
    res.json(record);
  }));

  // GET /api/ai/schedules/:id
  router.get("/schedules/:id", safeHandler((req, res) => {
    const record = log.get("schedule", req.params.id);
    if (!record) throw new NotFoundError(`Schedule ${req.params.id} not found`);
    res.json(record);
  }));

  // GET /api/ai/history?type=story|schedule
  router.get("/history", safeHandler((req, res) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw new InvalidInputError("type must be 'story' or 'schedule'");
    }
    const records = log.list(parsed.data.type);
    const failures = log.listFailures(parsed.data.type);
    res.json({ records, count: records.length, failures });
  }));

  return router;
}
