export interface ScheduleProfile {
  preferredWakeTime?: string;
  activityLevel?: string;
}

export interface StoryContext {
  /** Current overall progress in [0, 1], when known. */
  overallProgress?: number;
}

export const STORY_RULES = `
You write short inspirational stories for people recovering from an injury or surgery.
Strict rules:
- Under 100 words.
- Themes: patience, resilience, small victories.
- Short, plain sentences. The text is read aloud by a speech synthesizer.
- No markdown, no lists, no headings, no emoji, no quotation marks.
- Do not give medical advice.
`;

export function storyPrompt(context: StoryContext = {}): string {
  const lines = [STORY_RULES.trim(), "", "Write one story for a rehabilitation patient."];
  if (context.overallProgress !== undefined) {
    const percent = Math.round(context.overallProgress * 100);
    lines.push(`They have completed ${percent}% of today's exercises. Acknowledge where they are without quoting the number.`);
  }
  return lines.join("\n");
}

export const SCHEDULE_RULES = `
You plan a rehabilitation patient's day.
Strict rules:
- Output ONLY valid JSON. No markdown. No code fences.
- Use every task at least once. A task may appear more than once if repeating it through the day helps recovery.
- Copy each task name exactly as given. Do not invent tasks.
- Times use the format H:MM AM/PM, for example 9:00 AM or 2:30 PM.
- List slots in chronological order within a single day.
`;

export function schedulePrompt(tasks: readonly string[], profile: ScheduleProfile = {}): string {
  const context: Record<string, unknown> = { tasks };
  if (profile.preferredWakeTime) context.preferredWakeTime = profile.preferredWakeTime;
  if (profile.activityLevel) context.activityLevel = profile.activityLevel;

  return `${SCHEDULE_RULES.trim()}

Return JSON EXACTLY in this schema:
{
  "schedule": [{"time": string, "task": string}]
}
Data:
${JSON.stringify(context)}
`;
}
