import { readFile, writeFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { DEFAULT_DIAL_TIMEOUT_MS, defaultMpvPath } from "./shared/constants.js";
import { getEnv } from "./shared/env.js";
import { defaultSocketPath } from "./shared/ids.js";
import { isLogLevel, log, type LogLevel } from "./shared/logging.js";

const CONFIG_FILENAME = "config.json";

export function getDataDir(custom?: string): string {
  if (custom) return path.resolve(custom.replace(/^~(?=$|[\\/])/, homedir()));
  return path.join(homedir(), ".mpvctl");
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILENAME);
}

export type ConfigKey = "socket.path" | "mpv.path" | "dial.timeout" | "log.level";

const CONFIG_KEYS: readonly ConfigKey[] = ["socket.path", "mpv.path", "dial.timeout", "log.level"];

export function isConfigKey(s: string): s is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(s);
}

export const ConfigFileSchema = z
  .object({
    "socket.path": z.string().min(1).optional(),
    "mpv.path": z.string().min(1).optional(),
    "dial.timeout": z.number().int().positive().optional(),
    "log.level": z.enum(["error", "warn", "info", "debug", "trace"]).optional(),
  })
  .passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Everything the CLI needs to reach mpv, after all sources are merged. */
export interface Settings {
  socketPath: string;
  mpvPath: string;
  dialTimeoutMs: number;
  logLevel: LogLevel;
}

export async function readConfigFile(dataDir: string): Promise<ConfigFile> {
  const configPath = getConfigPath(dataDir);
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return {};
  }
  let data: unknown;
  try {
    data = JSON.parse(raw) as unknown;
  } catch (err) {
    log.warn({ err, configPath }, "config file is not valid JSON, using defaults");
    return {};
  }
  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    log.warn({ configPath, issues: result.error.issues }, "config file is invalid, using defaults");
    return {};
  }
  return result.data;
}

export async function writeConfigFile(dataDir: string, cfg: ConfigFile): Promise<void> {
  await mkdir(dataDir, { recursive: true });
  await writeFile(getConfigPath(dataDir), JSON.stringify(cfg, null, 2) + "\n", "utf8");
}

export async function configGet(dataDir: string, key: ConfigKey): Promise<string | number | undefined> {
  const cfg = await readConfigFile(dataDir);
  return cfg[key];
}

/** Set one key. Values are validated against the schema before anything is written. */
export async function configSet(dataDir: string, key: ConfigKey, value: string): Promise<void> {
  const cfg = await readConfigFile(dataDir);
  const next = ConfigFileSchema.safeParse({
    ...cfg,
    [key]: key === "dial.timeout" ? Number(value) : value,
  });
  if (!next.success) {
    const issue = next.error.issues[0];
    throw new Error(`Invalid value for ${key}: ${issue?.message ?? value}`);
  }
  await writeConfigFile(dataDir, next.data);
}

function parseTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}

/**
 * Merge settings. Later sources win: defaults, config file, environment,
 * then `overrides` (CLI flags).
 */
export async function resolveSettings(
  dataDir: string,
  overrides: Partial<Settings> = {},
): Promise<Settings> {
  const file = await readConfigFile(dataDir);
  const envLevel = getEnv("LOG_LEVEL");
  return {
    socketPath: overrides.socketPath ?? getEnv("SOCKET") ?? file["socket.path"] ?? defaultSocketPath(),
    mpvPath: overrides.mpvPath ?? getEnv("MPV_PATH") ?? file["mpv.path"] ?? defaultMpvPath(),
    dialTimeoutMs:
      overrides.dialTimeoutMs ??
      parseTimeout(getEnv("DIAL_TIMEOUT")) ??
      file["dial.timeout"] ??
      DEFAULT_DIAL_TIMEOUT_MS,
    logLevel:
      overrides.logLevel ??
      (envLevel !== undefined && isLogLevel(envLevel) ? envLevel : undefined) ??
      file["log.level"] ??
      "info",
  };
}
