import { TransformKinds, type PointSequence, type TransformKind } from "../model/transform.js";
import { BaseTransformStrategy } from "./BaseTransformStrategy.js";

// Uniform scale about the origin. Zero and negative factors are applied as given.
export class ScaleStrategy extends BaseTransformStrategy {
  readonly type = "scale";
  readonly kinds = [TransformKinds.Scale] as const;

  protected transformPoints(points: PointSequence, _kind: TransformKind, factor: number): void {
    if (factor === 1) return;
    for (const p of points) {
      p.x *= factor;
      p.y *= factor;
      p.z *= factor;
    }
  }
}
