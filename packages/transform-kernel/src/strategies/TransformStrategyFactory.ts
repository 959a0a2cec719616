import { strategyTypeOfKind, type StrategyType, type TransformKind } from "../model/transform.js";
import type { ITransformStrategy } from "./ITransformStrategy.js";
import { MoveStrategy } from "./MoveStrategy.js";
import { RotateStrategy } from "./RotateStrategy.js";
import { ScaleStrategy } from "./ScaleStrategy.js";

export class TransformStrategyFactory {
  // Strategies hold no state, so one instance per type is shared.
  private readonly instances: Record<StrategyType, ITransformStrategy> = {
    rotate: new RotateStrategy(),
    move: new MoveStrategy(),
    scale: new ScaleStrategy()
  };

  createStrategy(type: StrategyType): ITransformStrategy {
    return this.instances[type];
  }

  strategyForKind(kind: TransformKind): ITransformStrategy {
    return this.instances[strategyTypeOfKind(kind)];
  }
}
