import type { StrategyType, TransformKind } from "./model/transform.js";

export type TransformErrorCode = "INVALID_STATE" | "UNKNOWN_STRATEGY" | "UNSUPPORTED_KIND" | "INVALID_VALUE" | "INVALID_SETTINGS";

export abstract class TransformError extends Error {
  abstract readonly code: TransformErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class TransformStateError extends TransformError {
  readonly code = "INVALID_STATE";

  constructor(message = "No transform strategy selected") {
    super(message);
  }
}

export class UnknownStrategyError extends TransformError {
  readonly code = "UNKNOWN_STRATEGY";

  constructor(readonly strategy: string) {
    super(`Unknown transform strategy "${strategy}"`);
  }
}

export class UnsupportedTransformKindError extends TransformError {
  readonly code = "UNSUPPORTED_KIND";

  constructor(
    readonly kind: string,
    readonly strategy: StrategyType | null = null,
  ) {
    super(
      strategy
        ? `Transform kind "${kind}" is not supported by the ${strategy} strategy`
        : `Unknown transform kind "${kind}"`
    );
  }
}

export class InvalidTransformValueError extends TransformError {
  readonly code = "INVALID_VALUE";

  constructor(
    readonly kind: TransformKind,
    readonly value: number,
  ) {
    super(`Transform value for ${kind} must be a finite number, got ${value}`);
  }
}

export class InvalidSettingsError extends TransformError {
  readonly code = "INVALID_SETTINGS";
}

export function isTransformError(error: unknown): error is TransformError {
  return error instanceof TransformError;
}
