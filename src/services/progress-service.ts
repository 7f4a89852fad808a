import { InvalidInputError, TaskNotFoundError } from "../errors.js";
import type { TaskStore } from "../store/task-store.js";

export interface CompleteTaskResponse {
  success: true;
  taskId: number;
  newOverallProgress: number;
  message: string;
}

/**
 * Parses a task id from a route parameter. Only plain non-negative integers
 * pass: "3" and "0" are fine, "3.5", "-1", "0x3" and "" are not. An integer
 * that matches no task is left for the store to report as not found.
 */
export function parseTaskId(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new InvalidInputError("taskId must be an integer");
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new InvalidInputError("taskId must be an integer");
  }
  return id;
}

export class ProgressService {
  constructor(private readonly store: TaskStore) {}

  /**
   * Marks a task complete. Completing an already-completed task succeeds
   * again with the same progress.
   */
  completeTask(taskId: number): CompleteTaskResponse {
    const result = this.store.markCompleted(taskId);
    if (!result) {
      throw new TaskNotFoundError(taskId);
    }

    return {
      success: true,
      taskId,
      newOverallProgress: result.overallProgress,
      message: result.alreadyCompleted
        ? `Task ${taskId} was already complete`
        : `Task ${taskId} marked as complete`,
    };
  }
}
