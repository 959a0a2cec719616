export type {
  BoundsPayload,
  InputKeyDownPayload,
  KnownTopic,
  LogEventPayload,
  ModelLoadedPayload,
  ModelTransformedPayload,
  NormalizedModifiers,
  PointPayload,
  TopicPayloadMap,
  TransformFailedPayload,
  TransformRequestedPayload,
  TransformStrategyChangedPayload
} from "./payloads.js";
export type { BusEvent, EventBus, EventBusHandler, EventBusMiddleware, EventBusOptions, EventBusTopic, Unsubscribe } from "./eventBus.js";
export { createEventBus, createEventLoggerMiddleware } from "./eventBus.js";
export type { LogBuffer, LogEntry } from "./logBuffer.js";
export { createLogBuffer } from "./logBuffer.js";
export { Topics } from "./topics.js";
