import path from "node:path";
import { readFile } from "node:fs/promises";
import type { CuratorConfig, EmbeddingProviderPreference } from "./types.js";
import { log } from "./logger.js";
import { isMissingFile } from "./json-state.js";

const DEFAULT_DATA_DIR = path.join(process.env.HOME ?? "~", ".phrase-curator", "data");

export const DEFAULT_TRIGGER_INTERVAL = 10;
export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;
export const DEFAULT_TOP_K = 8;
export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

function resolveEnvVars(value: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
    const envValue = process.env[envVar];
    if (!envValue) {
      throw new Error(`Environment variable ${envVar} is not set`);
    }
    return envValue;
  });
}

function normalizeBaseUrl(value: string | undefined, field: string, source: "config" | "env"): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0) return undefined;

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    log.warn(`ignoring invalid ${field} from ${source}: not a valid URL`);
    return undefined;
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    log.warn(`ignoring ${field} from ${source}: unsupported URL scheme (${parsed.protocol.replace(":", "")})`);
    return undefined;
  }

  return parsed.toString().replace(/\/+$/, "");
}

function positiveInt(value: unknown, field: string, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  log.warn(`ignoring ${field}=${String(value)}: expected a positive integer`);
  return fallback;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? resolveEnvVars(value) : undefined;
}

const VALID_PROVIDERS: EmbeddingProviderPreference[] = ["openai", "local", "auto"];

function isProviderPreference(value: unknown): value is EmbeddingProviderPreference {
  return VALID_PROVIDERS.some((p) => p === value);
}

export function parseConfig(raw: unknown): CuratorConfig {
  const cfg: Record<string, unknown> =
    raw && typeof raw === "object" && !Array.isArray(raw) ? { ...raw } : {};

  let threshold = DEFAULT_SIMILARITY_THRESHOLD;
  if (cfg.similarityThreshold !== undefined) {
    const t = cfg.similarityThreshold;
    if (typeof t === "number" && Number.isFinite(t) && t >= -1 && t <= 1) {
      threshold = t;
    } else {
      log.warn(`ignoring similarityThreshold=${String(t)}: expected a number in [-1, 1]`);
    }
  }

  let embeddingProvider: EmbeddingProviderPreference = "auto";
  if (cfg.embeddingProvider !== undefined) {
    if (isProviderPreference(cfg.embeddingProvider)) {
      embeddingProvider = cfg.embeddingProvider;
    } else {
      log.warn(`ignoring embeddingProvider=${String(cfg.embeddingProvider)}`);
    }
  }

  // API key is optional at load time; labeling works without embeddings,
  // generation cycles just produce nothing.
  const openaiApiKey = optionalString(cfg.openaiApiKey) ?? process.env.OPENAI_API_KEY;

  let openaiBaseUrl: string | undefined;
  if (typeof cfg.openaiBaseUrl === "string" && cfg.openaiBaseUrl.length > 0) {
    openaiBaseUrl = normalizeBaseUrl(resolveEnvVars(cfg.openaiBaseUrl), "openaiBaseUrl", "config");
  } else {
    openaiBaseUrl = normalizeBaseUrl(process.env.OPENAI_BASE_URL, "openaiBaseUrl", "env");
  }

  const localEmbeddingUrl =
    typeof cfg.localEmbeddingUrl === "string"
      ? normalizeBaseUrl(resolveEnvVars(cfg.localEmbeddingUrl), "localEmbeddingUrl", "config")
      : undefined;

  return {
    dataDir:
      typeof cfg.dataDir === "string" && cfg.dataDir.length > 0
        ? cfg.dataDir
        : DEFAULT_DATA_DIR,
    debug: cfg.debug === true,
    triggerInterval: positiveInt(cfg.triggerInterval, "triggerInterval", DEFAULT_TRIGGER_INTERVAL),
    similarityThreshold: threshold,
    topK: positiveInt(cfg.topK, "topK", DEFAULT_TOP_K),
    embeddingProvider,
    embeddingModel:
      typeof cfg.embeddingModel === "string" && cfg.embeddingModel.length > 0
        ? cfg.embeddingModel
        : DEFAULT_EMBEDDING_MODEL,
    embeddingMaxChars: positiveInt(cfg.embeddingMaxChars, "embeddingMaxChars", 8000),
    openaiApiKey,
    openaiBaseUrl,
    localEmbeddingUrl,
    localEmbeddingApiKey: optionalString(cfg.localEmbeddingApiKey),
    autosaveEvery: positiveInt(cfg.autosaveEvery, "autosaveEvery", 10),
  };
}

/**
 * Read a JSON config file. A missing file is not an error; anything else
 * (unreadable, not an object) is.
 */
export async function loadConfigFile(filePath: string): Promise<Record<string, unknown>> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      log.debug(`no config file at ${filePath}; using defaults`);
      return {};
    }
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`config file ${filePath} must contain a JSON object`);
  }
  return { ...parsed };
}
