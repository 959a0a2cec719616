import { degToRad } from "@viewer/geometry";
import { axisOfKind, TransformKinds, type Axis, type PointSequence, type TransformKind } from "../model/transform.js";
import { BaseTransformStrategy } from "./BaseTransformStrategy.js";

/**
 * Right-handed rotation about a world axis through the origin.
 * Angles are in degrees; any finite angle is accepted.
 */
export class RotateStrategy extends BaseTransformStrategy {
  readonly type = "rotate";
  readonly kinds = [TransformKinds.RotateX, TransformKinds.RotateY, TransformKinds.RotateZ] as const;

  protected transformPoints(points: PointSequence, kind: TransformKind, angleDegrees: number): void {
    const axis = axisOfKind(kind);
    if (!axis || angleDegrees === 0) return;
    rotatePoints(points, axis, degToRad(angleDegrees));
  }
}

function rotatePoints(points: PointSequence, axis: Axis, angleRad: number): void {
  const c = Math.cos(angleRad);
  const s = Math.sin(angleRad);

  switch (axis) {
    case "x":
      for (const p of points) {
        const { y, z } = p;
        p.y = y * c - z * s;
        p.z = y * s + z * c;
      }
      return;
    case "y":
      for (const p of points) {
        const { x, z } = p;
        p.x = x * c + z * s;
        p.z = -x * s + z * c;
      }
      return;
    case "z":
      for (const p of points) {
        const { x, y } = p;
        p.x = x * c - y * s;
        p.y = x * s + y * c;
      }
      return;
  }
}
