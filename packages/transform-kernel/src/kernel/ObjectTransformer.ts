import { TransformStateError } from "../errors.js";
import type { PointSequence, StrategyType, TransformKind } from "../model/transform.js";
import type { ITransformStrategy } from "../strategies/ITransformStrategy.js";
import { TransformStrategyFactory } from "../strategies/TransformStrategyFactory.js";
import type { IObjectTransformer, ObjectTransformerEvent, ObjectTransformerEventHandler } from "./IObjectTransformer.js";

/**
 * Holds the active transform strategy and forwards requests to it.
 *
 * Starts with no strategy; `apply` throws {@link TransformStateError} until
 * `select` or `selectType` has been called. The transformer never owns the
 * strategies it is given and may be switched between them at any time.
 */
export class ObjectTransformer implements IObjectTransformer {
  private handlers = new Set<ObjectTransformerEventHandler>();
  private currentStrategy: ITransformStrategy | null = null;

  constructor(private readonly factory: TransformStrategyFactory = new TransformStrategyFactory()) {}

  on(handler: ObjectTransformerEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  get activeStrategy(): ITransformStrategy | null {
    return this.currentStrategy;
  }

  get activeStrategyType(): StrategyType | null {
    return this.currentStrategy?.type ?? null;
  }

  select(strategy: ITransformStrategy): void {
    this.currentStrategy = strategy;
    this.emit({ type: "TRANSFORM.STRATEGY_SELECTED", strategy: strategy.type });
  }

  selectType(type: StrategyType): void {
    this.select(this.factory.createStrategy(type));
  }

  apply(points: PointSequence, kind: TransformKind, value: number): void {
    const strategy = this.currentStrategy;
    if (!strategy) {
      throw new TransformStateError(`Cannot apply ${kind}: no transform strategy selected`);
    }

    strategy.transform(points, kind, value);
    this.emit({ type: "TRANSFORM.APPLIED", strategy: strategy.type, kind, value, pointCount: points.length });
  }

  private emit(event: ObjectTransformerEvent): void {
    for (const handler of this.handlers) {
      handler(event);
    }
  }
}
