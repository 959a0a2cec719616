import type { EventBus, Unsubscribe } from "./eventBus.js";
import { Topics } from "./topics.js";

export type LogEntry = {
  id: string;
  time: number;
  topic: string;
  payload: unknown;
};

export interface LogBuffer {
  entries(): readonly LogEntry[];
  clear(): void;
  dispose(): void;
}

/**
 * Collects `LOG_EVENT` payloads into a bounded ring, oldest first.
 * Pair with `createEventLoggerMiddleware` so that every dispatched
 * topic shows up here.
 */
export function createLogBuffer(
  bus: EventBus,
  options: { maxEntries?: number; now?: () => number } = {},
): LogBuffer {
  const maxEntries = options.maxEntries ?? 200;
  if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
    throw new Error(`maxEntries must be a positive integer, got ${maxEntries}`);
  }
  const now = options.now ?? Date.now;
  let logs: LogEntry[] = [];
  let sequence = 0;

  const unsubscribe: Unsubscribe = bus.subscribe(Topics.LOG_EVENT, (payload) => {
    const time = now();
    sequence += 1;
    logs.push({ id: `${time}-${sequence}`, time, topic: payload.topic, payload: payload.payload });
    if (logs.length > maxEntries) {
      logs = logs.slice(logs.length - maxEntries);
    }
  });

  return {
    entries: () => logs,
    clear: () => {
      logs = [];
    },
    dispose: () => {
      unsubscribe();
      logs = [];
    },
  };
}
