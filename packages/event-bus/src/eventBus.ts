import type { KnownTopic, TopicPayloadMap } from "./payloads.js";

export type EventBusTopic = KnownTopic | (string & {});

export type EventBusHandler<TPayload = unknown> = (payload: TPayload) => void;

export type Unsubscribe = () => void;

export type BusEvent = {
  topic: EventBusTopic;
  payload: unknown;
};

/** Runs around dispatch. Not calling `next` drops the event. */
export type EventBusMiddleware = (event: BusEvent, next: () => void, bus: EventBus) => void;

export type EventBusOptions = {
  middlewares?: EventBusMiddleware[];
};

export class EventBus {
  private readonly topics = new Map<EventBusTopic, Set<EventBusHandler>>();
  private chain: readonly EventBusMiddleware[];

  constructor(options: EventBusOptions = {}) {
    this.chain = [...(options.middlewares ?? [])];
  }

  subscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): Unsubscribe;
  subscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): Unsubscribe;
  subscribe(topic: EventBusTopic, handler: EventBusHandler<unknown>): Unsubscribe {
    let handlers = this.topics.get(topic);
    if (!handlers) {
      handlers = new Set();
      this.topics.set(topic, handlers);
    }
    handlers.add(handler);
    return () => this.unsubscribe(topic, handler);
  }

  unsubscribe<TTopic extends KnownTopic>(
    topic: TTopic,
    handler: EventBusHandler<TopicPayloadMap[TTopic]>,
  ): void;
  unsubscribe<TPayload>(topic: EventBusTopic, handler: EventBusHandler<TPayload>): void;
  unsubscribe(topic: EventBusTopic, handler: EventBusHandler<unknown>): void {
    const handlers = this.topics.get(topic);
    if (handlers?.delete(handler) && handlers.size === 0) {
      this.topics.delete(topic);
    }
  }

  listenerCount(topic: EventBusTopic): number {
    return this.topics.get(topic)?.size ?? 0;
  }

  publish<TTopic extends KnownTopic>(topic: TTopic, payload: TopicPayloadMap[TTopic]): void;
  publish<TPayload>(topic: EventBusTopic, payload: TPayload): void;
  publish(topic: EventBusTopic, payload: unknown): void {
    this.runFrom(0, { topic, payload });
  }

  destroy(): void {
    this.topics.clear();
    this.chain = [];
  }

  private runFrom(position: number, event: BusEvent): void {
    const middleware = this.chain[position];
    if (!middleware) {
      this.dispatch(event);
      return;
    }

    let advanced = false;
    middleware(
      event,
      () => {
        if (advanced) return;
        advanced = true;
        this.runFrom(position + 1, event);
      },
      this,
    );
  }

  private dispatch({ topic, payload }: BusEvent): void {
    const handlers = this.topics.get(topic);
    if (!handlers) return;
    // Copy first: handlers may unsubscribe while we iterate.
    for (const handler of Array.from(handlers)) {
      handler(payload);
    }
  }
}

export function createEventBus(options?: EventBusOptions): EventBus {
  return new EventBus(options);
}

/** Republishes every event on `logTopic` once its handlers have run. */
export function createEventLoggerMiddleware(options: {
  ignoreTopics?: EventBusTopic[];
  logTopic: EventBusTopic;
}): EventBusMiddleware {
  const skipped = new Set<EventBusTopic>([options.logTopic, ...(options.ignoreTopics ?? [])]);

  return (event, next, bus) => {
    next();
    if (!skipped.has(event.topic)) {
      bus.publish(options.logTopic, { topic: event.topic, payload: event.payload });
    }
  };
}
