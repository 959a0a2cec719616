import type { NormalizedModifiers } from "@viewer/event-bus";
import { strategyTypeOfKind, type TransformKind, type TransformRequest, type TransformSettings } from "@viewer/transform-kernel";

/** The strategy is implied by `kind`, so a binding cannot pair a kind with the wrong strategy. */
export type TransformKeyBinding = {
  key: string;
  kind: TransformKind;
  direction: 1 | -1;
};

export const transformKeymap: readonly TransformKeyBinding[] = [
  { key: "ArrowRight", kind: "TranslateX", direction: 1 },
  { key: "ArrowLeft", kind: "TranslateX", direction: -1 },
  { key: "ArrowUp", kind: "TranslateY", direction: 1 },
  { key: "ArrowDown", kind: "TranslateY", direction: -1 },
  { key: "PageUp", kind: "TranslateZ", direction: 1 },
  { key: "PageDown", kind: "TranslateZ", direction: -1 },

  { key: "X", kind: "RotateX", direction: 1 },
  { key: "Shift+X", kind: "RotateX", direction: -1 },
  { key: "Y", kind: "RotateY", direction: 1 },
  { key: "Shift+Y", kind: "RotateY", direction: -1 },
  { key: "Z", kind: "RotateZ", direction: 1 },
  { key: "Shift+Z", kind: "RotateZ", direction: -1 },

  { key: "=", kind: "Scale", direction: 1 },
  { key: "Shift++", kind: "Scale", direction: 1 },
  { key: "-", kind: "Scale", direction: -1 }
];

const NAMED_KEYS = new Set(["ArrowLeft", "ArrowRight", "ArrowUp", "ArrowDown", "PageUp", "PageDown"]);

export function normalizeKey(event: { key: string; modifiers: NormalizedModifiers }): string | null {
  const main = normalizeMainKey(event.key);
  if (!main) return null;

  const parts: string[] = [];
  if (event.modifiers.ctrlKey || event.modifiers.metaKey) parts.push("Mod");
  if (event.modifiers.shiftKey) parts.push("Shift");
  if (event.modifiers.altKey) parts.push("Alt");
  parts.push(main);
  return parts.join("+");
}

function normalizeMainKey(key: string): string | null {
  if (key.length === 1) return key.toUpperCase();
  if (NAMED_KEYS.has(key)) return key;
  return null;
}

export function resolveKeyBinding(
  normalizedKey: string,
  settings: TransformSettings,
  keymap: readonly TransformKeyBinding[] = transformKeymap,
): TransformRequest | null {
  const binding = keymap.find((item) => item.key === normalizedKey);
  if (!binding) return null;

  switch (strategyTypeOfKind(binding.kind)) {
    case "move":
      return { kind: binding.kind, value: binding.direction * settings.moveStep };
    case "rotate":
      return { kind: binding.kind, value: binding.direction * settings.rotateStepDegrees };
    case "scale":
      return {
        kind: binding.kind,
        value: binding.direction > 0 ? settings.scaleStepFactor : 1 / settings.scaleStepFactor
      };
  }
}
