import type { CompletionResult, DashboardView, Task, UserProfile } from "./types.js";

export interface TaskStoreSeed {
  user: UserProfile;
  tasks: Task[];
}

/** Mock plan the prototype serves until a real patient record exists. */
export const DEFAULT_SEED: TaskStoreSeed = {
  user: { name: "Alex" },
  tasks: [
    { id: 1, label: "Morning Meditation", icon: "ph-leaf", completed: true },
    { id: 2, label: "Knee Stretches", icon: "ph-person-simple-run", completed: false },
    { id: 3, label: "10-min Walk", icon: "ph-person-simple-walk", completed: false },
  ],
};

/**
 * Rounds to two decimals. Math.round is monotonic, so more completed
 * tasks can never produce a smaller value.
 */
export function roundProgress(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Fraction of completed tasks in [0, 1]. An empty plan counts as 0.
 */
export function calculateProgress(tasks: readonly Pick<Task, "completed">[]): number {
  if (tasks.length === 0) return 0;
  const done = tasks.filter(t => t.completed).length;
  return roundProgress(done / tasks.length);
}

/**
 * In-memory patient plan. One instance per app; nothing here survives a restart.
 *
 * Progress is never stored: every read derives it from the task flags,
 * so it cannot drift from the plan.
 */
export class TaskStore {
  private readonly tasks = new Map<number, Task>();
  private readonly user: UserProfile;

  constructor(seed: TaskStoreSeed = DEFAULT_SEED) {
    for (const task of seed.tasks) {
      if (!Number.isInteger(task.id) || task.id <= 0) {
        throw new Error(`Task id must be a positive integer, got ${task.id}`);
      }
      if (!task.label.trim()) {
        throw new Error(`Task ${task.id} must have a label`);
      }
      if (this.tasks.has(task.id)) {
        throw new Error(`Duplicate task id ${task.id}`);
      }
      this.tasks.set(task.id, { ...task });
    }
    this.user = { ...seed.user };
  }

  get size(): number {
    return this.tasks.size;
  }

  getTask(id: number): Task | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task } : undefined;
  }

  listTasks(): Task[] {
    return Array.from(this.tasks.values(), t => ({ ...t }));
  }

  overallProgress(): number {
    return calculateProgress(Array.from(this.tasks.values()));
  }

  dashboard(): DashboardView {
    return {
      user: { name: this.user.name, overallProgress: this.overallProgress() },
      dailyPlan: this.listTasks(),
    };
  }

  /**
   * Sets the completion flag and recomputes progress in one synchronous step.
   * Returns null for an unknown id without touching anything.
   */
  markCompleted(id: number): CompletionResult | null {
    const task = this.tasks.get(id);
    if (!task) return null;

    const alreadyCompleted = task.completed;
    task.completed = true;

    return {
      task: { ...task },
      alreadyCompleted,
      overallProgress: this.overallProgress(),
    };
  }
}
