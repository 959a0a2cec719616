import { axisOfKind, TransformKinds, type PointSequence, type TransformKind } from "../model/transform.js";
import { BaseTransformStrategy } from "./BaseTransformStrategy.js";

export class MoveStrategy extends BaseTransformStrategy {
  readonly type = "move";
  readonly kinds = [TransformKinds.TranslateX, TransformKinds.TranslateY, TransformKinds.TranslateZ] as const;

  protected transformPoints(points: PointSequence, kind: TransformKind, step: number): void {
    const axis = axisOfKind(kind);
    if (!axis || step === 0) return;
    for (const p of points) {
      p[axis] += step;
    }
  }
}
