import type { PointSequence, StrategyType, TransformKind } from "../model/transform.js";
import type { ITransformStrategy } from "../strategies/ITransformStrategy.js";

export type ObjectTransformerEvent =
  | { type: "TRANSFORM.STRATEGY_SELECTED"; strategy: StrategyType }
  | { type: "TRANSFORM.APPLIED"; strategy: StrategyType; kind: TransformKind; value: number; pointCount: number };

export type ObjectTransformerEventHandler = (event: ObjectTransformerEvent) => void;

export interface IObjectTransformer {
  on(handler: ObjectTransformerEventHandler): () => void;

  readonly activeStrategy: ITransformStrategy | null;
  readonly activeStrategyType: StrategyType | null;

  select(strategy: ITransformStrategy): void;
  selectType(type: StrategyType): void;
  apply(points: PointSequence, kind: TransformKind, value: number): void;
}
