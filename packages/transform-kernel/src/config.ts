import { InvalidSettingsError } from "./errors.js";

/** Step sizes used when a single user action (a key press, a wheel notch) drives a transform. */
export type TransformSettings = {
  moveStep: number;
  rotateStepDegrees: number;
  scaleStepFactor: number;
};

export const DEFAULT_TRANSFORM_SETTINGS: Readonly<TransformSettings> = Object.freeze({
  moveStep: 0.1,
  rotateStepDegrees: 5,
  scaleStepFactor: 1.1
});

const SETTING_KEYS = ["moveStep", "rotateStepDegrees", "scaleStepFactor"] as const;

export function resolveTransformSettings(overrides: Partial<TransformSettings> = {}): TransformSettings {
  const settings: TransformSettings = { ...DEFAULT_TRANSFORM_SETTINGS };
  for (const key of SETTING_KEYS) {
    const value = overrides[key];
    if (value !== undefined) settings[key] = value;
  }

  for (const [key, value] of Object.entries(settings)) {
    if (!Number.isFinite(value)) {
      throw new InvalidSettingsError(`${key} must be a finite number, got ${value}`);
    }
  }
  if (settings.moveStep <= 0) {
    throw new InvalidSettingsError(`moveStep must be positive, got ${settings.moveStep}`);
  }
  if (settings.rotateStepDegrees <= 0) {
    throw new InvalidSettingsError(`rotateStepDegrees must be positive, got ${settings.rotateStepDegrees}`);
  }
  if (settings.scaleStepFactor <= 0 || settings.scaleStepFactor === 1) {
    throw new InvalidSettingsError(`scaleStepFactor must be positive and not 1, got ${settings.scaleStepFactor}`);
  }

  return settings;
}
