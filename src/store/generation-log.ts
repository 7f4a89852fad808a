import crypto from "node:crypto";
import type {
  GenerationFailure,
  GenerationRecord,
  GenerationType,
  ScheduleRecord,
  ScheduledSlot,
  StoryRecord,
} from "./types.js";

export const DEFAULT_LOG_LIMIT = 100;

function shortId(): string {
  return crypto.randomUUID().replace(/-/g, "").slice(0, 8);
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Keeps the most recent generated stories and schedules so the frontend can
 * fetch them again by id, plus the most recent failed attempts. Each list
 * drops its oldest entries once `limit` is reached.
 */
export class GenerationLog {
  private records: GenerationRecord[] = [];
  private failures: GenerationFailure[] = [];

  constructor(
    private readonly limit: number = DEFAULT_LOG_LIMIT,
    private readonly now: () => Date = () => new Date(),
  ) {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new Error(`Generation log limit must be a positive integer, got ${limit}`);
    }
  }

  recordStory(text: string, metadata: Record<string, unknown> = {}): StoryRecord {
    const record: StoryRecord = {
      id: shortId(),
      type: "story",
      text,
      wordCount: countWords(text),
      charCount: text.length,
      createdAt: this.now().toISOString(),
      metadata,
    };
    this.push(record);
    return record;
  }

  recordSchedule(schedule: ScheduledSlot[], tasks: string[]): ScheduleRecord {
    const record: ScheduleRecord = {
      id: shortId(),
      type: "schedule",
      schedule: schedule.map(slot => ({ ...slot })),
      taskCount: schedule.length,
      tasks: [...tasks],
      createdAt: this.now().toISOString(),
    };
    this.push(record);
    return record;
  }

  recordFailure(type: GenerationType, code: string, error: string): GenerationFailure {
    const failure: GenerationFailure = {
      id: shortId(),
      type,
      success: false,
      code,
      error,
      createdAt: this.now().toISOString(),
    };
    this.failures.push(failure);
    if (this.failures.length > this.limit) {
      this.failures = this.failures.slice(this.failures.length - this.limit);
    }
    return failure;
  }

  get(type: "story", id: string): StoryRecord | undefined;
  get(type: "schedule", id: string): ScheduleRecord | undefined;
  get(type: GenerationType, id: string): GenerationRecord | undefined {
    return this.records.find(r => r.type === type && r.id === id);
  }

  /** Newest first. */
  list(type?: GenerationType): GenerationRecord[] {
    const matching = type ? this.records.filter(r => r.type === type) : this.records;
    return [...matching].reverse();
  }

  /** Newest first. */
  listFailures(type?: GenerationType): GenerationFailure[] {
    const matching = type ? this.failures.filter(f => f.type === type) : this.failures;
    return [...matching].reverse();
  }

  private push(record: GenerationRecord): void {
    this.records.push(record);
    if (this.records.length > this.limit) {
      this.records = this.records.slice(this.records.length - this.limit);
    }
  }
}
