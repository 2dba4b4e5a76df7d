import { readFileSync } from "node:fs";
import { isPromptCategory, type BenchmarkPrompt, type PromptCategory } from "./types.js";

export class PromptSetValidationError extends Error {
  public constructor(public readonly errors: string[]) {
    super(`Invalid prompt set: ${errors.join("; ")}`);
    this.name = "PromptSetValidationError";
  }
}

export function validatePromptSet(value: unknown): string[] {
  if (!Array.isArray(value)) return ["prompt set must be an array"];
  const errors: string[] = [];
  const seen = new Set<string>();
  value.forEach((entry: unknown, index) => {
    if (!isRecord(entry)) {
      errors.push(`prompts[${index}] must be an object`);
      return;
    }
    if (typeof entry.id !== "string" || !entry.id.trim()) {
      errors.push(`prompts[${index}].id is required`);
    } else if (seen.has(entry.id)) {
      errors.push(`prompts[${index}].id ${entry.id} is duplicated`);
    } else {
      seen.add(entry.id);
    }
    if (!isPromptCategory(entry.category)) errors.push(`prompts[${index}].category is invalid`);
    if (typeof entry.prompt !== "string" || !entry.prompt.trim()) errors.push(`prompts[${index}].prompt is required`);
    if (
      entry.followUps !== undefined &&
      (!Array.isArray(entry.followUps) || !entry.followUps.every((item: unknown) => typeof item === "string"))
    ) {
      errors.push(`prompts[${index}].followUps must be an array of strings`);
    }
  });
  return errors;
}

export function parsePromptSet(value: unknown): BenchmarkPrompt[] {
  const errors = validatePromptSet(value);
  if (errors.length > 0 || !Array.isArray(value)) throw new PromptSetValidationError(errors);
  return value.filter(isRecord).map((entry) => {
    const prompt: BenchmarkPrompt = {
      id: String(entry.id),
      category: isPromptCategory(entry.category) ? entry.category : "coding",
      prompt: String(entry.prompt)
    };
    if (Array.isArray(entry.followUps)) prompt.followUps = entry.followUps.map(String);
    return prompt;
  });
}

export function loadPromptSet(filePath: string): BenchmarkPrompt[] {
  const content = readFileSync(filePath, "utf8");
  return parsePromptSet(JSON.parse(content) as unknown);
}

export function selectPrompts(
  prompts: BenchmarkPrompt[],
  options: { category?: PromptCategory; limit?: number } = {}
): BenchmarkPrompt[] {
  const filtered = options.category ? prompts.filter((prompt) => prompt.category === options.category) : prompts;
  return options.limit !== undefined ? filtered.slice(0, Math.max(0, options.limit)) : filtered;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
