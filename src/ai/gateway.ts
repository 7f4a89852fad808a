/**
 * AI Gateway — story and schedule generation on top of a ModelClient.
 * Stateless: every call goes to the model, nothing is cached.
 */

import { InvalidInputError, UpstreamUnavailableError } from "../errors.js";
import type { ScheduledSlot } from "../store/types.js";
import type { ModelClient } from "./model-client.js";
import { cleanStoryText, parseSchedule } from "./parse.js";
import { schedulePrompt, storyPrompt, type ScheduleProfile, type StoryContext } from "./prompts.js";

export interface AiGateway {
  generateStory(context?: StoryContext): Promise<string>;
  generateSchedule(tasks: readonly string[], profile?: ScheduleProfile): Promise<ScheduledSlot[]>;
}

/**
 * Checks a task-name list before any model call: it must be a non-empty
 * array of non-blank strings. Names come back exactly as given, duplicates kept.
 */
export function validateTaskNames(tasks: unknown): string[] {
  if (!Array.isArray(tasks) || tasks.length === 0) {
    throw new InvalidInputError("tasks must be a non-empty array");
  }
  return tasks.map((task, index) => {
    if (typeof task !== "string" || !task.trim()) {
      throw new InvalidInputError(`tasks[${index}] must be a non-empty string`);
    }
    return task;
  });
}

export class ModelAiGateway implements AiGateway {
  constructor(private readonly model: ModelClient) {}

  async generateStory(context: StoryContext = {}): Promise<string> {
    const raw = await this.model.generate(storyPrompt(context), { temperature: 0.8, thinkingBudget: 0 });
    const story = cleanStoryText(raw);
    if (!story) {
      throw new UpstreamUnavailableError("Model returned an empty story");
    }
    return story;
  }

  async generateSchedule(tasks: readonly string[], profile: ScheduleProfile = {}): Promise<ScheduledSlot[]> {
    const names = validateTaskNames(tasks);
    const raw = await this.model.generate(schedulePrompt(names, profile), { json: true, temperature: 0.2 });
    return parseSchedule(raw, names);
  }
}
