import { CommandError, ProtocolError } from "./shared/errors.js";
import { DEFAULT_DIAL_TIMEOUT_MS, SUCCESS } from "./shared/constants.js";
import { defaultSocketPath } from "./shared/ids.js";
import {
  IpcConnection,
  type AsyncRequest,
  type ConnectionState,
} from "./ipc/connection.js";
import type { PlayerEvent } from "./protocols/mpv/types.js";
import { openTransport } from "./ipc/transport.js";

export type LoadFileMode = "replace" | "append" | "append-play";

export type SeekFlag =
  | "relative"
  | "absolute"
  | "exact"
  | "keyframes"
  | "relative-percent"
  | "absolute-percent";

export interface CommandOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export type EventHandler = (event: PlayerEvent) => void | Promise<void>;

/**
 * Typed wrappers around mpv's input commands. See
 * https://mpv.io/manual/stable/#list-of-input-commands for the full list;
 * anything not wrapped here goes through {@link MpvClient.command}.
 */
export class MpvClient {
  private observerId = 0;

  constructor(readonly connection: IpcConnection) {}

  get state(): ConnectionState {
    return this.connection.state;
  }

  get closed(): Promise<void> {
    return this.connection.closed;
  }

  close(): Promise<void> {
    return this.connection.close();
  }

  /** Run a command and return its `data`. Throws CommandError when mpv reports a failure. */
  async command(name: string, args: readonly unknown[] = [], options: CommandOptions = {}): Promise<unknown> {
    const response = await this.connection.request(name, args, options);
    if (response.error !== SUCCESS) {
      throw new CommandError(name, response.error, response.data);
    }
    return response.data;
  }

  /**
   * Run a command with mpv's `async` flag set. The reply still has to be
   * checked for `error !== "success"`.
   */
  commandAsync(name: string, args: readonly unknown[] = [], options: CommandOptions = {}): AsyncRequest {
    return this.connection.requestAsync(name, args, { ...options, async: true });
  }

  async play(options?: CommandOptions): Promise<void> {
    await this.setProperty("pause", false, options);
  }

  async pause(options?: CommandOptions): Promise<void> {
    await this.setProperty("pause", true, options);
  }

  async seek(position: number, flags: readonly SeekFlag[] = [], options?: CommandOptions): Promise<void> {
    const args: unknown[] = flags.length === 0 ? [position] : [position, flags.join("+")];
    await this.command("seek", args, options);
  }

  async loadFile(file: string, mode: LoadFileMode = "replace", options?: CommandOptions): Promise<void> {
    await this.command("loadfile", [file, mode], options);
  }

  // Property setters

  async setProperty(property: string, value: unknown, options?: CommandOptions): Promise<void> {
    await this.command("set_property", [property, value], options);
  }

  setVolume(volume: number, options?: CommandOptions): Promise<void> {
    return this.setProperty("volume", volume, options);
  }

  setMute(mute: boolean, options?: CommandOptions): Promise<void> {
    return this.setProperty("mute", mute, options);
  }

  setLoop(loop: boolean, options?: CommandOptions): Promise<void> {
    return this.setProperty("loop", loop, options);
  }

  setSpeed(speed: number, options?: CommandOptions): Promise<void> {
    return this.setProperty("speed", speed, options);
  }

  setPosition(position: number, options?: CommandOptions): Promise<void> {
    return this.setProperty("time-pos", position, options);
  }

  // Property getters

  getProperty(property: string, options?: CommandOptions): Promise<unknown> {
    return this.command("get_property", [property], options);
  }

  async getPropertyBoolean(property: string, options?: CommandOptions): Promise<boolean> {
    const value = await this.getProperty(property, options);
    if (typeof value !== "boolean") {
      throw new ProtocolError(`mpv: property ${property} is not a boolean: ${JSON.stringify(value)}`);
    }
    return value;
  }

  async getPropertyNumber(property: string, options?: CommandOptions): Promise<number> {
    const value = await this.getProperty(property, options);
    if (typeof value !== "number") {
      throw new ProtocolError(`mpv: property ${property} is not a number: ${JSON.stringify(value)}`);
    }
    return value;
  }

  async getPropertyString(property: string, options?: CommandOptions): Promise<string> {
    const value = await this.getProperty(property, options);
    if (typeof value !== "string") {
      throw new ProtocolError(`mpv: property ${property} is not a string: ${JSON.stringify(value)}`);
    }
    return value;
  }

  getPaused(options?: CommandOptions): Promise<boolean> {
    return this.getPropertyBoolean("pause", options);
  }

  getDuration(options?: CommandOptions): Promise<number> {
    return this.getPropertyNumber("duration", options);
  }

  getPosition(options?: CommandOptions): Promise<number> {
    return this.getPropertyNumber("time-pos", options);
  }

  getVolume(options?: CommandOptions): Promise<number> {
    return this.getPropertyNumber("volume", options);
  }

  getMute(options?: CommandOptions): Promise<boolean> {
    return this.getPropertyBoolean("mute", options);
  }

  getFilename(options?: CommandOptions): Promise<string> {
    return this.getPropertyString("filename", options);
  }

  getSpeed(options?: CommandOptions): Promise<number> {
    return this.getPropertyNumber("speed", options);
  }

  getIdleActive(options?: CommandOptions): Promise<boolean> {
    return this.getPropertyBoolean("idle-active", options);
  }

  getLoop(options?: CommandOptions): Promise<boolean> {
    return this.getPropertyBoolean("loop", options);
  }

  /**
   * Call `fn` with the new value every time `property` changes. Changes are
   * delivered in order. Resolves to a function that stops the observation.
   */
  async observeProperty(
    property: string,
    fn: (value: unknown) => void | Promise<void>,
    options?: CommandOptions,
  ): Promise<() => Promise<void>> {
    const observerId = ++this.observerId;
    const subscription = this.connection.subscribe((event) => {
      if (event.name !== "property-change" || event.id !== observerId) return;
      return fn(event.fields.data);
    }, "sync");

    try {
      await this.command("observe_property", [observerId, property], options);
    } catch (err) {
      subscription.unsubscribe();
      throw err;
    }

    return async () => {
      subscription.unsubscribe();
      await this.command("unobserve_property", [observerId]);
    };
  }

  /** Handler runs in its own task for every event. Returns a remover. */
  addEventHandler(fn: EventHandler): () => void {
    const subscription = this.connection.subscribe(fn, "concurrent");
    return () => subscription.unsubscribe();
  }

  /** Handler is awaited before the next event is dispatched. Returns a remover. */
  addEventHandlerSync(fn: EventHandler): () => void {
    const subscription = this.connection.subscribe(fn, "sync");
    return () => subscription.unsubscribe();
  }
}

export interface ClientOptions {
  socketPath?: string;
  dialTimeoutMs?: number;
  eventBufferSize?: number;
}

/** Connect to an mpv instance already listening on `socketPath`. */
export async function openClient(options: ClientOptions = {}): Promise<MpvClient> {
  const socketPath = options.socketPath ?? defaultSocketPath();
  const transport = await openTransport(socketPath, options.dialTimeoutMs ?? DEFAULT_DIAL_TIMEOUT_MS);
  const connection = new IpcConnection(transport, {
    endpoint: socketPath,
    eventBufferSize: options.eventBufferSize,
  });
  return new MpvClient(connection);
}
