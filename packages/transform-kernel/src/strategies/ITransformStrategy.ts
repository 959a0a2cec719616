import type { PointSequence, StrategyType, TransformKind } from "../model/transform.js";

export interface ITransformStrategy {
  readonly type: StrategyType;
  readonly kinds: readonly TransformKind[];
  supports(kind: TransformKind): boolean;
  /** Mutates `points` in place. Throws before touching any point when the request is rejected. */
  transform(points: PointSequence, kind: TransformKind, value: number): void;
}
