import { readFileSync, existsSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { dirname, join } from "node:path";
import { openClient, type MpvClient } from "../client.js";
import { getDataDir, resolveSettings, type Settings } from "../config.js";
import { initLogger, isLogFormat, isLogLevel, log } from "../shared/logging.js";

/** Options defined on the root program and visible to every command. */
export type GlobalOptions = {
  socket?: string;
  timeout?: string;
  dataDir?: string;
  logLevel?: string;
  logFormat?: string;
  verbose?: boolean;
};

/** Command-line values are JSON when they parse as JSON, plain strings otherwise. */
export function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return raw;
  }
}

export function parseTimeoutFlag(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`invalid --timeout: ${raw}`);
  }
  return n;
}

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value ?? null) + "\n");
}

export function getPackageJsonVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    // src/cli/ when run from sources, dist/cli/ when built.
    const candidates = [join(here, "..", "..", "package.json"), join(process.cwd(), "package.json")];
    for (const p of candidates) {
      if (existsSync(p)) {
        const pkg = JSON.parse(readFileSync(p, "utf8")) as { version?: string };
        return pkg.version ?? "0.1.0";
      }
    }
  } catch (err) {
    log.debug({ err }, "could not read package.json version");
  }
  return "0.1.0";
}

/** Configure logging from the global flags and resolve connection settings. */
export async function setup(opts: GlobalOptions): Promise<Settings> {
  const dataDir = getDataDir(opts.dataDir);
  const requested = opts.verbose ? "debug" : opts.logLevel;
  const settings = await resolveSettings(dataDir, {
    socketPath: opts.socket,
    dialTimeoutMs: parseTimeoutFlag(opts.timeout),
    logLevel: requested !== undefined && isLogLevel(requested) ? requested : undefined,
  });
  const format = opts.logFormat ?? "text";
  initLogger(settings.logLevel, isLogFormat(format) ? format : "text");
  return settings;
}

/** Connect, run `fn`, and close the connection whatever happens. */
export async function withClient<T>(opts: GlobalOptions, fn: (client: MpvClient) => Promise<T>): Promise<T> {
  const settings = await setup(opts);
  const client = await openClient({
    socketPath: settings.socketPath,
    dialTimeoutMs: settings.dialTimeoutMs,
  });
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

/** Resolves on SIGINT/SIGTERM or when `until` settles, whichever comes first. */
export function waitForInterrupt(until?: Promise<unknown>): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      process.off("SIGINT", done);
      process.off("SIGTERM", done);
      resolve();
    };
    process.on("SIGINT", done);
    process.on("SIGTERM", done);
    void until?.then(done, done);
  });
}
