export { MpvClient, openClient } from "./client.js";
export type { ClientOptions, CommandOptions, EventHandler, LoadFileMode, SeekFlag } from "./client.js";
export { MpvProcess, buildMpvArgs, connectWithRetry } from "./process.js";
export type { MpvProcessOptions, RetryOptions } from "./process.js";
export { IpcConnection } from "./ipc/connection.js";
export type { AsyncRequest, ConnectionState, IpcConnectionOptions, RequestOptions } from "./ipc/connection.js";
export type { DispatchMode, EventCallback, Subscription } from "./ipc/event-hub.js";
export { openTransport, socketTransport, streamTransport } from "./ipc/transport.js";
export type { Transport } from "./ipc/transport.js";
export { decodeFrame, encodeCommand } from "./protocols/mpv/codec.js";
export type { Call, CommandResponse, Frame, PlayerEvent } from "./protocols/mpv/types.js";
export {
  CancelledError,
  ClosedError,
  CommandError,
  ConnectionError,
  IpcError,
  ProcessError,
  ProtocolError,
  TransportError,
  isIpcError,
} from "./shared/errors.js";
export type { CancelReason, IpcErrorCode } from "./shared/errors.js";
export {
  defaultSocketPath,
  incrementingPidSocketPath,
  incrementingSocketPath,
  randomSocketPath,
} from "./shared/ids.js";
export { initLogger } from "./shared/logging.js";
