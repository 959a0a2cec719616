import { Topics, type EventBus } from "@viewer/event-bus";
import { Box3, type Vec3 } from "@viewer/geometry";
import {
  UnknownStrategyError,
  UnsupportedTransformKindError,
  isStrategyType,
  isTransformError,
  isTransformKind,
  resolveTransformSettings,
  strategyTypeOfKind,
  type IObjectTransformer,
  type PointSequence,
  type TransformKind,
  type TransformSettings
} from "@viewer/transform-kernel";
import { normalizeKey, resolveKeyBinding, transformKeymap, type TransformKeyBinding } from "./keymap.js";

export type TransformMediatorOptions = {
  settings?: Partial<TransformSettings>;
  keymap?: readonly TransformKeyBinding[];
};

/**
 * Connects bus topics to an {@link IObjectTransformer} acting on one model.
 *
 * Transform failures raised while handling a topic are published on
 * `TRANSFORM_FAILED`; anything that is not a transform error propagates to
 * the publisher.
 */
export class TransformMediator {
  private unsubscribes: Array<() => void> = [];
  private model: PointSequence = [];
  private readonly settings: TransformSettings;
  private readonly keymap: readonly TransformKeyBinding[];

  constructor(
    private readonly bus: EventBus,
    private readonly transformer: IObjectTransformer,
    options: TransformMediatorOptions = {},
  ) {
    this.settings = resolveTransformSettings(options.settings);
    this.keymap = options.keymap ?? transformKeymap;
  }

  get attached(): boolean {
    return this.unsubscribes.length > 0;
  }

  attach() {
    if (this.attached) return;

    this.unsubscribes.push(
      this.bus.subscribe(Topics.MODEL_LOADED, (payload) => {
        this.setModel(payload.points);
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.TRANSFORM_STRATEGY_CHANGED, (payload) => {
        this.reportFailures(() => this.selectStrategy(payload.strategy));
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.TRANSFORM_REQUESTED, (payload) => {
        this.reportFailures(() => {
          if (!isTransformKind(payload.kind)) {
            throw new UnsupportedTransformKindError(payload.kind);
          }
          this.applyToModel(payload.kind, payload.value);
        });
      }),
    );

    this.unsubscribes.push(
      this.bus.subscribe(Topics.INPUT_KEY_DOWN, (payload) => {
        const key = normalizeKey(payload);
        if (!key) return;
        const resolved = resolveKeyBinding(key, this.settings, this.keymap);
        if (!resolved) return;

        this.reportFailures(() => {
          const strategy = strategyTypeOfKind(resolved.kind);
          if (this.transformer.activeStrategyType !== strategy) {
            this.transformer.selectType(strategy);
          }
          this.applyToModel(resolved.kind, resolved.value);
        });
      }),
    );
  }

  detach() {
    for (const unsub of this.unsubscribes) unsub();
    this.unsubscribes = [];
  }

  setModel(points: PointSequence): void {
    this.model = points;
  }

  getModel(): readonly Vec3[] {
    return this.model;
  }

  private selectStrategy(strategy: string): void {
    if (!isStrategyType(strategy)) {
      throw new UnknownStrategyError(strategy);
    }
    this.transformer.selectType(strategy);
  }

  private applyToModel(kind: TransformKind, value: number): void {
    this.transformer.apply(this.model, kind, value);

    this.bus.publish(Topics.MODEL_TRANSFORMED, {
      strategy: this.transformer.activeStrategyType ?? strategyTypeOfKind(kind),
      kind,
      value,
      pointCount: this.model.length,
      bounds: this.modelBounds()
    });
  }

  private modelBounds(): { min: Vec3; max: Vec3 } | null {
    if (this.model.length === 0) return null;
    const box = Box3.create(this.model);
    return { min: box.min, max: box.max };
  }

  private reportFailures(action: () => void): void {
    try {
      action();
    } catch (error) {
      if (!isTransformError(error)) throw error;
      this.bus.publish(Topics.TRANSFORM_FAILED, { code: error.code, message: error.message });
    }
  }
}
