export type PointPayload = {
  x: number;
  y: number;
  z: number;
};

export type BoundsPayload = {
  min: PointPayload;
  max: PointPayload;
};

export type ModelLoadedPayload = {
  // Shared by reference: transforms mutate these points in place.
  points: PointPayload[];
};

export type TransformStrategyChangedPayload = {
  strategy: string;
};

export type TransformRequestedPayload = {
  kind: string;
  value: number;
};

export type ModelTransformedPayload = {
  strategy: string;
  kind: string;
  value: number;
  pointCount: number;
  bounds: BoundsPayload | null;
};

export type TransformFailedPayload = {
  code: string;
  message: string;
};

export type NormalizedModifiers = {
  altKey: boolean;
  ctrlKey: boolean;
  metaKey: boolean;
  shiftKey: boolean;
};

export type InputKeyDownPayload = {
  key: string;
  code: string;
  modifiers: NormalizedModifiers;
  timestamp: number;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["MODEL_LOADED"]]: ModelLoadedPayload;
} & {
  [K in TopicsConst["MODEL_TRANSFORMED"]]: ModelTransformedPayload;
} & {
  [K in TopicsConst["TRANSFORM_STRATEGY_CHANGED"]]: TransformStrategyChangedPayload;
} & {
  [K in TopicsConst["TRANSFORM_REQUESTED"]]: TransformRequestedPayload;
} & {
  [K in TopicsConst["TRANSFORM_FAILED"]]: TransformFailedPayload;
} & {
  [K in TopicsConst["INPUT_KEY_DOWN"]]: InputKeyDownPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
