import { getLogger } from "./logging.js";

/** CLI exit codes. */
export const EXIT = {
  SUCCESS: 0,
  GENERIC_ERROR: 1,
  INVALID_ARGS: 2,
  CONNECT_FAILURE: 3,
  COMMAND_FAILURE: 4,
} as const;

export function exit(code: number, message?: string): never {
  if (message) {
    if (code === EXIT.SUCCESS) getLogger().info(message);
    else getLogger().error(message);
  }
  process.exit(code);
}

export type IpcErrorCode =
  | "ETRANSPORT"
  | "EPROTOCOL"
  | "ECOMMAND"
  | "ECANCELLED"
  | "ECLOSED"
  | "ECONNECT"
  | "EPROCESS";

/** Base class for everything the IPC layer surfaces to callers. */
export abstract class IpcError extends Error {
  abstract readonly code: IpcErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Reading from or writing to the socket failed. */
export class TransportError extends IpcError {
  readonly code = "ETRANSPORT";
}

/** A reply was valid JSON but not a valid mpv frame. */
export class ProtocolError extends IpcError {
  readonly code = "EPROTOCOL";
}

/** mpv answered a command with something other than "success". */
export class CommandError extends IpcError {
  readonly code = "ECOMMAND";

  constructor(
    readonly command: string,
    readonly error: string,
    readonly data?: unknown,
  ) {
    super(`mpv: command ${command} failed: ${error}`);
  }
}

export type CancelReason = "aborted" | "timeout";

export class CancelledError extends IpcError {
  readonly code = "ECANCELLED";

  constructor(
    readonly reason: CancelReason,
    options?: { cause?: unknown },
  ) {
    super(reason === "timeout" ? "ipc: request timed out" : "ipc: request cancelled", options);
  }
}

export class ClosedError extends IpcError {
  readonly code = "ECLOSED";

  constructor(options?: { cause?: unknown }) {
    super("ipc: closed", options);
  }
}

/** Thrown when the socket cannot be dialed within the timeout. */
export class ConnectionError extends IpcError {
  readonly code = "ECONNECT";
}

/** Thrown when the mpv process fails to start or exits underneath its clients. */
export class ProcessError extends IpcError {
  readonly code = "EPROCESS";
}

export function isIpcError(err: unknown): err is IpcError {
  return err instanceof IpcError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
