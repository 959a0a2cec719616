import type { Point3 } from "@viewer/geometry";

export type Axis = "x" | "y" | "z";

export type PointSequence = Point3[];

export const TransformKinds = {
  TranslateX: "TranslateX",
  TranslateY: "TranslateY",
  TranslateZ: "TranslateZ",
  RotateX: "RotateX",
  RotateY: "RotateY",
  RotateZ: "RotateZ",
  Scale: "Scale"
} as const;

export type TransformKind = (typeof TransformKinds)[keyof typeof TransformKinds];

export type StrategyType = "rotate" | "move" | "scale";

/** `value` is a distance, an angle in degrees, or a scale factor, depending on `kind`. */
export type TransformRequest = {
  kind: TransformKind;
  value: number;
};

const KIND_AXIS: Record<TransformKind, Axis | null> = {
  TranslateX: "x",
  TranslateY: "y",
  TranslateZ: "z",
  RotateX: "x",
  RotateY: "y",
  RotateZ: "z",
  Scale: null
};

const KIND_STRATEGY: Record<TransformKind, StrategyType> = {
  TranslateX: "move",
  TranslateY: "move",
  TranslateZ: "move",
  RotateX: "rotate",
  RotateY: "rotate",
  RotateZ: "rotate",
  Scale: "scale"
};

export function isTransformKind(value: unknown): value is TransformKind {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(KIND_AXIS, value);
}

export function isStrategyType(value: unknown): value is StrategyType {
  return value === "rotate" || value === "move" || value === "scale";
}

export function axisOfKind(kind: TransformKind): Axis | null {
  return KIND_AXIS[kind];
}

export function strategyTypeOfKind(kind: TransformKind): StrategyType {
  return KIND_STRATEGY[kind];
}

export function translateKind(axis: Axis): TransformKind {
  switch (axis) {
    case "x":
      return TransformKinds.TranslateX;
    case "y":
      return TransformKinds.TranslateY;
    case "z":
      return TransformKinds.TranslateZ;
  }
}

export function rotateKind(axis: Axis): TransformKind {
  switch (axis) {
    case "x":
      return TransformKinds.RotateX;
    case "y":
      return TransformKinds.RotateY;
    case "z":
      return TransformKinds.RotateZ;
  }
}
