export type { Axis, PointSequence, StrategyType, TransformKind, TransformRequest } from "./model/transform.js";
export {
  TransformKinds,
  axisOfKind,
  isStrategyType,
  isTransformKind,
  rotateKind,
  strategyTypeOfKind,
  translateKind
} from "./model/transform.js";

export type { TransformErrorCode } from "./errors.js";
export {
  InvalidSettingsError,
  InvalidTransformValueError,
  TransformError,
  TransformStateError,
  UnknownStrategyError,
  UnsupportedTransformKindError,
  isTransformError
} from "./errors.js";

export type { TransformSettings } from "./config.js";
export { DEFAULT_TRANSFORM_SETTINGS, resolveTransformSettings } from "./config.js";

export type { ITransformStrategy } from "./strategies/ITransformStrategy.js";
export { BaseTransformStrategy } from "./strategies/BaseTransformStrategy.js";
export { RotateStrategy } from "./strategies/RotateStrategy.js";
export { MoveStrategy } from "./strategies/MoveStrategy.js";
export { ScaleStrategy } from "./strategies/ScaleStrategy.js";
export { TransformStrategyFactory } from "./strategies/TransformStrategyFactory.js";

export type {
  IObjectTransformer,
  ObjectTransformerEvent,
  ObjectTransformerEventHandler
} from "./kernel/IObjectTransformer.js";
export { ObjectTransformer } from "./kernel/ObjectTransformer.js";
