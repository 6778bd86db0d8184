import type { Logger } from "../shared/logging.js";
import { DEFAULT_EVENT_BUFFER_SIZE } from "../shared/constants.js";
import type { PlayerEvent } from "../protocols/mpv/types.js";
import { AsyncQueue } from "./queue.js";

/**
 * `sync` subscribers are awaited before the next event goes to anyone;
 * `concurrent` subscribers are started and left to run.
 */
export type DispatchMode = "sync" | "concurrent";

export type EventCallback = (event: PlayerEvent) => void | Promise<void>;

export interface Subscription {
  readonly mode: DispatchMode;
  readonly active: boolean;
  unsubscribe(): void;
}

interface Subscriber {
  callback: EventCallback;
  mode: DispatchMode;
  active: boolean;
  /** Sequence number of the last event offered before registration. */
  since: number;
}

interface Queued {
  seq: number;
  event: PlayerEvent;
}

export interface EventHubOptions {
  logger: Logger;
  /** Events held while a dispatch is in progress; more than this are dropped. */
  bufferSize?: number;
}

export class EventHub {
  /** Replaced, never mutated, so a dispatch in progress keeps its snapshot. */
  private subscribers: readonly Subscriber[] = [];
  private readonly queue: AsyncQueue<Queued>;
  private readonly logger: Logger;
  private seq = 0;
  private droppedEvents = 0;
  /** Settles once `close` was called and every buffered event was dispatched. */
  readonly done: Promise<void>;

  constructor(options: EventHubOptions) {
    this.logger = options.logger;
    this.queue = new AsyncQueue<Queued>(options.bufferSize ?? DEFAULT_EVENT_BUFFER_SIZE);
    this.done = this.dispatchLoop();
  }

  subscribe(callback: EventCallback, mode: DispatchMode = "concurrent"): Subscription {
    const subscriber: Subscriber = { callback, mode, active: true, since: this.seq };
    this.subscribers = [...this.subscribers, subscriber];
    return {
      mode,
      get active() {
        return subscriber.active;
      },
      unsubscribe: () => {
        if (!subscriber.active) return;
        subscriber.active = false;
        this.subscribers = this.subscribers.filter((s) => s !== subscriber);
      },
    };
  }

  /** Hand an event over without waiting. False when it had to be dropped. */
  offer(event: PlayerEvent): boolean {
    if (this.queue.offer({ seq: ++this.seq, event })) return true;
    this.droppedEvents++;
    this.logger.debug({ event: event.name }, "event dropped, dispatcher busy");
    return false;
  }

  close(): void {
    this.queue.close();
  }

  get subscriberCount(): number {
    return this.subscribers.length;
  }

  get dropped(): number {
    return this.droppedEvents;
  }

  private async dispatchLoop(): Promise<void> {
    for (;;) {
      const queued = await this.queue.take();
      if (queued === undefined) return;
      await this.dispatch(queued);
    }
  }

  private async dispatch({ seq, event }: Queued): Promise<void> {
    for (const subscriber of this.subscribers) {
      // Subscribers registered after the event was offered never see it.
      if (!subscriber.active || subscriber.since >= seq) continue;
      if (subscriber.mode === "sync") {
        try {
          await subscriber.callback(event);
        } catch (err) {
          this.logger.warn({ err, event: event.name }, "event subscriber failed");
        }
      } else {
        this.start(subscriber, event);
      }
    }
  }

  private start(subscriber: Subscriber, event: PlayerEvent): void {
    void Promise.resolve()
      .then(() => {
        if (subscriber.active) return subscriber.callback(event);
      })
      .catch((err: unknown) => {
        this.logger.warn({ err, event: event.name }, "event subscriber failed");
      });
  }
}
