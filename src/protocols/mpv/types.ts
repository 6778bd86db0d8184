import { type } from "arktype";

export const ResponseFrameSchema = type({
  request_id: "number.integer",
  error: "string",
  "data?": "unknown",
});

export const EventFrameSchema = type({
  event: "string",
  "id?": "number.integer",
});

/** What goes on the wire for one call. */
export interface CommandFrame {
  command: unknown[];
  async: boolean;
  request_id: number;
}

export type ResponseFrame = typeof ResponseFrameSchema.infer;

/** A call as issued by a client. Immutable once built. */
export interface Call {
  readonly id: number;
  readonly method: string;
  readonly args: readonly unknown[];
  readonly async: boolean;
}

/** The reply mpv sent for one call. `error` is "success" on success. */
export interface CommandResponse {
  requestId: number;
  error: string;
  data: unknown;
}

/** An unsolicited message from mpv, e.g. `property-change` or `end-file`. */
export interface PlayerEvent {
  name: string;
  /** Observer id for `property-change`, absent for most events. */
  id?: number;
  /** Every field of the raw message, `event` included. */
  fields: Readonly<Record<string, unknown>>;
}

export type Frame =
  | { kind: "response"; response: CommandResponse }
  | { kind: "event"; event: PlayerEvent }
  | { kind: "invalid"; requestId?: number; reason: string };
