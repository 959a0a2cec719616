export { TransformMediator, type TransformMediatorOptions } from "./TransformMediator.js";
export {
  normalizeKey,
  resolveKeyBinding,
  transformKeymap,
  type TransformKeyBinding
} from "./keymap.js";
