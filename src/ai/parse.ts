import { z } from "zod";
import { MalformedUpstreamResponseError } from "../errors.js";
import type { ScheduledSlot } from "../store/types.js";

const ScheduledSlotSchema = z.object({
  time: z.string().trim().min(1),
  task: z.string().trim().min(1),
});

const ScheduleSchema = z.array(ScheduledSlotSchema).min(1);

const ScheduleEnvelopeSchema = z.union([
  z.object({ schedule: ScheduleSchema }).passthrough(),
  ScheduleSchema,
]);

/**
 * Returns the end index (exclusive) of the balanced JSON value that opens at
 * `start`, or -1 if it never closes. Brackets inside strings are ignored.
 */
function findBalancedEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      if (escapeNext) escapeNext = false;
      else if (char === "\\") escapeNext = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{" || char === "[") {
      depth += 1;
    } else if (char === "}" || char === "]") {
      depth -= 1;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

function parseStrict(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Valid JSON is taken as is; only text that fails is cleaned and retried. */
function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  const strict = parseStrict(text);
  if (strict.ok) return strict;
  const cleaned = cleanJsonString(text);
  return cleaned === text ? strict : parseStrict(cleaned);
}

/** Drops trailing commas and line comments, which models like to emit. */
function cleanJsonString(str: string): string {
  return str
    .replace(/,\s*([}\]])/g, "$1")
    .replace(/^\s*\/\/.*$/gm, "");
}

/**
 * Pulls the first JSON value out of model output. Tries, in order: the whole
 * text, a ```json fenced block, then each balanced {...} or [...] span.
 * Returns undefined when nothing parses.
 */
export function extractJson(text: string): unknown {
  const whole = tryParse(text.trim());
  if (whole.ok) return whole.value;

  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) {
    const inner = tryParse(fenced[1].trim());
    if (inner.ok) return inner.value;
  }

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (char !== "{" && char !== "[") continue;
    const end = findBalancedEnd(text, i);
    if (end < 0) continue;
    const candidate = tryParse(text.slice(i, end));
    if (candidate.ok) return candidate.value;
  }
  return undefined;
}

/**
 * Validates model output against the requested `{schedule: [{time, task}]}`
 * shape. Every slot must name one of `tasks` and every task must appear at
 * least once; anything else is a malformed response.
 *
 * Names are matched with surrounding whitespace ignored, and each slot comes
 * back carrying the caller's own spelling of the task.
 */
export function parseSchedule(text: string, tasks: readonly string[]): ScheduledSlot[] {
  const value = extractJson(text);
  if (value === undefined) {
    throw new MalformedUpstreamResponseError("Model response did not contain JSON", text);
  }

  const parsed = ScheduleEnvelopeSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new MalformedUpstreamResponseError(`Invalid schedule format from model: ${issues.join(", ")}`, text);
  }

  const slots = Array.isArray(parsed.data) ? parsed.data : parsed.data.schedule;
  const known = new Map<string, string>();
  for (const task of tasks) {
    const key = task.trim();
    if (!known.has(key)) known.set(key, task);
  }

  const unknown = slots.filter(slot => !known.has(slot.task));
  if (unknown.length > 0) {
    const names = [...new Set(unknown.map(slot => slot.task))];
    throw new MalformedUpstreamResponseError(`Model scheduled unknown tasks: ${names.join(", ")}`, text);
  }

  const scheduled = new Set(slots.map(slot => slot.task));
  const missing = [...known.keys()].filter(key => !scheduled.has(key));
  if (missing.length > 0) {
    throw new MalformedUpstreamResponseError(`Model left tasks unscheduled: ${missing.join(", ")}`, text);
  }

  return slots.map(slot => ({ time: slot.time, task: known.get(slot.task) ?? slot.task }));
}

/**
 * Flattens model prose into plain sentences for speech synthesis:
 * markdown markers go, whitespace collapses to single spaces.
 */
export function cleanStoryText(text: string): string {
  return text
    .replace(/```[\s\S]*?```/g, " ")
    .replace(/^#+\s*/gm, "")
    .replace(/[*_`~#]+/g, "")
    .replace(/\s+/g, " ")
    .trim();
}
