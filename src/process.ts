import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";
import { openClient, type ClientOptions, type MpvClient } from "./client.js";
import {
  DEFAULT_CONN_MAX_RETRIES,
  DEFAULT_CONN_RETRY_DELAY_MS,
  defaultMpvPath,
} from "./shared/constants.js";
import { ProcessError, errorMessage } from "./shared/errors.js";
import { defaultSocketPath } from "./shared/ids.js";
import { childLogger, type Logger } from "./shared/logging.js";

export interface MpvProcessOptions {
  /** mpv executable; defaults to `mpv` (`mpv.exe` on Windows). */
  path?: string;
  /** Extra arguments, appended after the IPC ones. */
  args?: string[];
  socketPath?: string;
  stdio?: StdioOptions;
  /** Connection attempts after the first one; the delay doubles each time. */
  connMaxRetries?: number;
  connRetryDelayMs?: number;
  client?: Omit<ClientOptions, "socketPath">;
}

export function buildMpvArgs(socketPath: string, args: readonly string[] = []): string[] {
  return [`--input-ipc-server=${socketPath}`, "--idle", ...args];
}

export interface RetryOptions {
  retries: number;
  delayMs: number;
  /** Checked before each retry; returning false stops early. */
  shouldRetry?: () => boolean;
}

/** Call `connect` until it succeeds, waiting `delayMs`, `2*delayMs`, ... in between. */
export async function connectWithRetry<T>(connect: () => Promise<T>, options: RetryOptions): Promise<T> {
  let delay = options.delayMs;
  for (let attempt = 0; ; attempt++) {
    try {
      return await connect();
    } catch (err) {
      if (attempt >= options.retries || options.shouldRetry?.() === false) throw err;
      await sleep(delay);
      delay *= 2;
    }
  }
}

/**
 * Owns one mpv child process and the clients connected to it. Clients are
 * only valid while the process runs; they are closed when it exits.
 */
export class MpvProcess {
  readonly path: string;
  readonly args: string[];
  readonly socketPath: string;
  private readonly options: MpvProcessOptions;
  private readonly logger: Logger;
  private child: ChildProcess | null = null;
  private starting: Promise<void> | null = null;
  private exit: Promise<number | null> | null = null;
  private readonly clients = new Set<MpvClient>();

  constructor(options: MpvProcessOptions = {}) {
    this.options = options;
    this.path = options.path ?? defaultMpvPath();
    this.args = options.args ?? [];
    this.socketPath = options.socketPath ?? defaultSocketPath();
    this.logger = childLogger({ component: "process", path: this.path });
  }

  get running(): boolean {
    return this.child !== null;
  }

  /** Start mpv unless it is already running. Concurrent callers share one start. */
  start(): Promise<void> {
    if (this.child) return Promise.resolve();
    if (!this.starting) {
      this.starting = this.spawnChild().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async spawnChild(): Promise<void> {
    const args = buildMpvArgs(this.socketPath, this.args);
    this.logger.debug({ args }, "starting mpv");
    const child = spawn(this.path, args, { stdio: this.options.stdio ?? "ignore" });

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", (err) => {
        reject(new ProcessError(`mpv: failed to start ${this.path}: ${errorMessage(err)}`, { cause: err }));
      });
    });

    this.child = child;
    this.exit = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        this.logger.debug({ code, signal }, "mpv exited");
        if (this.child === child) this.child = null;
        this.closeClients().catch((err: unknown) => {
          this.logger.error({ err }, "failed to close clients");
        });
        resolve(code);
      });
    });
  }

  /** Start mpv if needed, then connect a new client, retrying while mpv sets up its socket. */
  async openClient(): Promise<MpvClient> {
    await this.start();
    const client = await connectWithRetry(
      () => openClient({ ...this.options.client, socketPath: this.socketPath }),
      {
        retries: this.options.connMaxRetries ?? DEFAULT_CONN_MAX_RETRIES,
        delayMs: this.options.connRetryDelayMs ?? DEFAULT_CONN_RETRY_DELAY_MS,
        shouldRetry: () => this.running,
      },
    );
    this.clients.add(client);
    client.closed
      .then(() => this.clients.delete(client))
      .catch((err: unknown) => this.logger.error({ err }, "client close failed"));
    return client;
  }

  /** Resolves with mpv's exit code, or null when it was killed by a signal. */
  wait(): Promise<number | null> {
    if (!this.exit) return Promise.reject(new ProcessError("mpv: process is not started"));
    return this.exit;
  }

  /** Close every client, then kill mpv. */
  async close(): Promise<void> {
    await this.closeClients();
    const child = this.child;
    if (!child) return;
    this.child = null;
    child.kill();
    await this.exit;
  }

  private async closeClients(): Promise<void> {
    const clients = [...this.clients];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.close()));
  }
}
