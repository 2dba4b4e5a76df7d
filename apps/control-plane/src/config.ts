import { readFileSync } from "node:fs";
import path from "node:path";
import {
  PROVIDER_KINDS,
  createGenerationClient,
  isProviderKind,
  type GenerationClient,
  type ProviderKind
} from "@costwise/provider-sdk";

export interface ModelEntry {
  provider: string;
  model: string;
  inputCostPer1k: number;
  outputCostPer1k: number;
  baseUrl?: string;
}

export interface RouterSettings {
  defaultThreshold: number;
  minSamples: number;
  fallbackModel: string;
}

export interface BenchmarkConfig {
  models: Record<string, ModelEntry>;
  judgeModel: ModelEntry;
  router: RouterSettings;
  promptsPath: string;
}

export type ApiKeys = Record<ProviderKind, string | undefined>;

export class ConfigValidationError extends Error {
  public constructor(public readonly errors: string[]) {
    super(`Invalid configuration: ${errors.join("; ")}`);
    this.name = "ConfigValidationError";
  }
}

export function resolveConfigPath(): string {
  return process.env.COSTWISE_CONFIG_PATH ?? path.resolve(process.cwd(), "costwise.config.json");
}

export function getApiKeys(env: NodeJS.ProcessEnv = process.env): ApiKeys {
  return {
    openai: env.OPENAI_API_KEY || undefined,
    anthropic: env.ANTHROPIC_API_KEY || undefined,
    google: env.GOOGLE_API_KEY || undefined
  };
}

export function validateModelEntry(value: unknown, label: string): string[] {
  if (!isRecord(value)) return [`${label} must be an object`];
  const errors: string[] = [];
  if (typeof value.provider !== "string" || !value.provider.trim()) errors.push(`${label}.provider is required`);
  if (typeof value.model !== "string" || !value.model.trim()) errors.push(`${label}.model is required`);
  if (!isNonNegative(value.inputCostPer1k)) errors.push(`${label}.inputCostPer1k must be a non-negative number`);
  if (!isNonNegative(value.outputCostPer1k)) errors.push(`${label}.outputCostPer1k must be a non-negative number`);
  if (value.baseUrl !== undefined && (typeof value.baseUrl !== "string" || !value.baseUrl.startsWith("http"))) {
    errors.push(`${label}.baseUrl must start with http`);
  }
  return errors;
}

export function validateBenchmarkConfig(value: unknown): string[] {
  if (!isRecord(value)) return ["config must be an object"];
  const errors: string[] = [];
  if (!isRecord(value.models) || Object.keys(value.models).length === 0) {
    errors.push("models must name at least one model");
  } else {
    for (const [name, entry] of Object.entries(value.models)) {
      errors.push(...validateModelEntry(entry, `models.${name}`));
    }
  }
  errors.push(...validateModelEntry(value.judgeModel, "judgeModel"));

  const router = isRecord(value.router) ? value.router : {};
  if (router.defaultThreshold !== undefined && !isUnitInterval(router.defaultThreshold)) {
    errors.push("router.defaultThreshold must be within [0, 1]");
  }
  if (router.minSamples !== undefined && !(Number.isInteger(router.minSamples) && isNonNegative(router.minSamples))) {
    errors.push("router.minSamples must be a non-negative integer");
  }
  if (typeof router.fallbackModel !== "string" || !router.fallbackModel.trim()) {
    errors.push("router.fallbackModel is required");
  }
  if (value.promptsPath !== undefined && typeof value.promptsPath !== "string") {
    errors.push("promptsPath must be a string");
  }
  return errors;
}

export function parseBenchmarkConfig(value: unknown, baseDir = process.cwd()): BenchmarkConfig {
  const errors = validateBenchmarkConfig(value);
  if (errors.length > 0 || !isRecord(value) || !isRecord(value.models)) throw new ConfigValidationError(errors);
  const router = isRecord(value.router) ? value.router : {};

  const models: Record<string, ModelEntry> = {};
  for (const [name, entry] of Object.entries(value.models)) {
    models[name] = toModelEntry(entry);
  }
  return {
    models,
    judgeModel: toModelEntry(value.judgeModel),
    router: {
      defaultThreshold: typeof router.defaultThreshold === "number" ? router.defaultThreshold : 0.8,
      minSamples: typeof router.minSamples === "number" ? router.minSamples : 5,
      fallbackModel: String(router.fallbackModel)
    },
    promptsPath: path.resolve(baseDir, typeof value.promptsPath === "string" ? value.promptsPath : "data/prompts.json")
  };
}

export function loadBenchmarkConfig(configPath: string = resolveConfigPath()): BenchmarkConfig {
  const content = readFileSync(configPath, "utf8");
  return parseBenchmarkConfig(JSON.parse(content) as unknown, path.dirname(configPath));
}

export interface ResolvedClients {
  clients: Map<string, GenerationClient>;
  skipped: Array<{ name: string; reason: string }>;
}

/**
 * Builds one client per configured model. A model with an unknown provider or no API key
 * is skipped and reported; the remaining models still run.
 */
export function resolveModelClients(models: Record<string, ModelEntry>, apiKeys: ApiKeys): ResolvedClients {
  const clients = new Map<string, GenerationClient>();
  const skipped: Array<{ name: string; reason: string }> = [];
  for (const [name, entry] of Object.entries(models)) {
    const resolved = resolveModelClient(entry, apiKeys);
    if (typeof resolved === "string") {
      skipped.push({ name, reason: resolved });
      continue;
    }
    clients.set(name, resolved);
  }
  return { clients, skipped };
}

/** Returns the client, or the reason it cannot be built. */
export function resolveModelClient(entry: ModelEntry, apiKeys: ApiKeys): GenerationClient | string {
  if (!isProviderKind(entry.provider)) {
    return `Unknown provider: ${entry.provider} (expected one of ${PROVIDER_KINDS.join(", ")})`;
  }
  const apiKey = apiKeys[entry.provider];
  if (!apiKey) return `No API key for ${entry.provider}`;
  return createGenerationClient({
    providerKind: entry.provider,
    model: entry.model,
    apiKey,
    inputCostPer1k: entry.inputCostPer1k,
    outputCostPer1k: entry.outputCostPer1k,
    baseUrl: entry.baseUrl
  });
}

function toModelEntry(value: unknown): ModelEntry {
  const record = isRecord(value) ? value : {};
  const entry: ModelEntry = {
    provider: String(record.provider),
    model: String(record.model),
    inputCostPer1k: Number(record.inputCostPer1k),
    outputCostPer1k: Number(record.outputCostPer1k)
  };
  if (typeof record.baseUrl === "string") entry.baseUrl = record.baseUrl;
  return entry;
}

function isNonNegative(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}

function isUnitInterval(value: unknown): value is number {
  return isNonNegative(value) && value <= 1;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
