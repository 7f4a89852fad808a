/**
 * Record types held in memory by the task store and generation log.
 */

// ─── Tasks ─────────────────────────────────────────────────────────────────

export interface Task {
  id: number;
  label: string;
  /** Presentational tag for the frontend; never inspected here. */
  icon: string;
  completed: boolean;
}

export interface UserProfile {
  name: string;
}

export interface DashboardView {
  user: { name: string; overallProgress: number };
  dailyPlan: Task[];
}

export interface CompletionResult {
  task: Task;
  alreadyCompleted: boolean;
  overallProgress: number;
}

// ─── Generated content ─────────────────────────────────────────────────────

export interface ScheduledSlot {
  time: string;
  task: string;
}

export type GenerationType = "story" | "schedule";

interface GenerationBase {
  id: string;
  createdAt: string;
}

export interface StoryRecord extends GenerationBase {
  type: "story";
  text: string;
  wordCount: number;
  charCount: number;
  metadata: Record<string, unknown>;
}

export interface ScheduleRecord extends GenerationBase {
  type: "schedule";
  schedule: ScheduledSlot[];
  taskCount: number;
  tasks: string[];
}

export type GenerationRecord = StoryRecord | ScheduleRecord;

/** A generation attempt that ended in an error; kept apart from the results. */
export interface GenerationFailure {
  id: string;
  type: GenerationType;
  success: false;
  code: string;
  error: string;
  createdAt: string;
}
