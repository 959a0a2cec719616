import { InvalidTransformValueError, UnsupportedTransformKindError } from "../errors.js";
import type { PointSequence, StrategyType, TransformKind } from "../model/transform.js";
import type { ITransformStrategy } from "./ITransformStrategy.js";

export abstract class BaseTransformStrategy implements ITransformStrategy {
  abstract readonly type: StrategyType;
  abstract readonly kinds: readonly TransformKind[];

  supports(kind: TransformKind): boolean {
    return this.kinds.includes(kind);
  }

  transform(points: PointSequence, kind: TransformKind, value: number): void {
    if (!this.supports(kind)) {
      throw new UnsupportedTransformKindError(kind, this.type);
    }
    if (!Number.isFinite(value)) {
      throw new InvalidTransformValueError(kind, value);
    }
    this.transformPoints(points, kind, value);
  }

  protected abstract transformPoints(points: PointSequence, kind: TransformKind, value: number): void;
}
