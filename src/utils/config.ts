import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "yaml";
import { z } from "zod";
import { ConfigError, ErrorCode, FileSystemError, isErrnoException } from "./errors.js";

/**
 * Expand tilde (~) to home directory in a path.
 * Also handles Windows %USERPROFILE% environment variable.
 *
 * @example
 * expandPath("~/kb"); // "/Users/username/kb" on macOS
 */
export function expandPath(inputPath: string): string {
  if (!inputPath) return inputPath;

  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  if (inputPath === "~") {
    return os.homedir();
  }

  if (process.platform === "win32" && inputPath.includes("%USERPROFILE%")) {
    return inputPath.replace(/%USERPROFILE%/gi, os.homedir());
  }

  return path.resolve(inputPath);
}

// ============================================================================
// Schema
// ============================================================================

export const EncoderConfigSchema = z.object({
  /** CLIP-as-service HTTP endpoint */
  serverUrl: z.string().url().default("http://localhost:51000"),
  batchSize: z.number().int().positive().default(32),
  timeoutMs: z.number().int().positive().default(30000),
});

export const StoreConfigSchema = z.object({
  backend: z.enum(["lancedb", "memory"]).default("lancedb"),
  dbPath: z.string().default("~/.stratum/db"),
  collection: z.string().min(1).default("multimodal_knowledge_base"),
  /** Upper bound on records read back when rebuilding the keyword corpus */
  corpusPageSize: z.number().int().positive().default(16384),
  /** Vector candidates requested per final result (never below 3) */
  candidateMultiplier: z.number().int().positive().default(3),
});

export const ChunkingConfigSchema = z.object({
  maxChunkSize: z.number().int().positive().default(500),
  minChunkSize: z.number().int().nonnegative().default(50),
  overlapSize: z.number().int().nonnegative().default(50),
});

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  alpha: z.number().min(0).max(1).default(0.7),
  k1: z.number().positive().default(1.5),
  b: z.number().min(0).max(1).default(0.75),
  hierarchical: z.boolean().default(true),
  includeParent: z.boolean().default(true),
  includeChildren: z.boolean().default(true),
});

export const LoggingConfigSchema = z.object({
  debug: z.boolean().default(false),
  logToFile: z.boolean().default(false),
});

export const StratumConfigSchema = z.object({
  encoder: EncoderConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  chunking: ChunkingConfigSchema.default({}),
  retrieval: RetrievalConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type EncoderConfig = z.infer<typeof EncoderConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type StratumConfig = z.infer<typeof StratumConfigSchema>;

/** Shape accepted by saveConfig/updateConfig: any subset of each section */
export type StratumConfigInput = z.input<typeof StratumConfigSchema>;

export const DEFAULT_CONFIG: StratumConfig = StratumConfigSchema.parse({});

// ============================================================================
// Paths
// ============================================================================

/**
 * Get the configuration directory path.
 * STRATUM_CONFIG_DIR overrides ~/.stratum (tests use this to avoid touching real config).
 */
export function getConfigDir(): string {
  if (process.env.STRATUM_CONFIG_DIR) {
    return process.env.STRATUM_CONFIG_DIR;
  }
  return path.join(os.homedir(), ".stratum");
}

export function getConfigPath(): string {
  return path.join(getConfigDir(), "config.yaml");
}

export async function ensureConfigDir(): Promise<void> {
  await fs.mkdir(getConfigDir(), { recursive: true });
}

// ============================================================================
// Load / save
// ============================================================================

function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const encoder = isRecord(raw.encoder) ? { ...raw.encoder } : {};
  const store = isRecord(raw.store) ? { ...raw.store } : {};

  if (process.env.CLIP_SERVER) {
    encoder.serverUrl = process.env.CLIP_SERVER;
  }
  if (process.env.STRATUM_DB_PATH) {
    store.dbPath = process.env.STRATUM_DB_PATH;
  }
  if (process.env.STRATUM_COLLECTION) {
    store.collection = process.env.STRATUM_COLLECTION;
  }

  return { ...raw, encoder, store };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw configuration object (file contents plus env overrides).
 *
 * @throws {ConfigError} CONFIG_INVALID_VALUE naming the first offending key
 */
export function parseConfig(raw: unknown): StratumConfig {
  const input = applyEnvOverrides(isRecord(raw) ? raw : {});
  const result = StratumConfigSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const configKey = issue ? issue.path.join(".") : undefined;
    throw new ConfigError(
      ErrorCode.CONFIG_INVALID_VALUE,
      `Invalid configuration value${configKey ? ` at "${configKey}"` : ""}: ${issue?.message ?? "unknown"}`,
      { configKey }
    );
  }
  return result.data;
}

/**
 * Load the configuration from disk.
 *
 * A missing file yields defaults; partial files are merged with defaults per section.
 * Environment overrides (CLIP_SERVER, STRATUM_DB_PATH, STRATUM_COLLECTION) win over the file.
 *
 * @throws {ConfigError} If the file is malformed YAML or fails validation
 */
export async function loadConfig(): Promise<StratumConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return parseConfig({});
    }
    // Only a missing file means defaults
    throw isErrnoException(error) ? FileSystemError.fromNodeError(error, configPath, "read") : error;
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(content);
  } catch (error) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, undefined, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  return parseConfig(parsed ?? {});
}

export async function saveConfig(config: StratumConfigInput): Promise<void> {
  await ensureConfigDir();
  await fs.writeFile(getConfigPath(), yaml.stringify(config), "utf-8");
}

/**
 * Update the configuration with partial changes, merged per section.
 */
export async function updateConfig(updates: StratumConfigInput): Promise<StratumConfig> {
  const current = await loadConfig();
  const updated = StratumConfigSchema.parse({
    encoder: { ...current.encoder, ...updates.encoder },
    store: { ...current.store, ...updates.store },
    chunking: { ...current.chunking, ...updates.chunking },
    retrieval: { ...current.retrieval, ...updates.retrieval },
    logging: { ...current.logging, ...updates.logging },
  });
  await saveConfig(updated);
  return updated;
}

export async function configExists(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    return true;
  } catch {
    return false;
  }
}
