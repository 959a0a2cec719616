export const Topics = {
  MODEL_LOADED: "MODEL.LOADED",
  MODEL_TRANSFORMED: "MODEL.TRANSFORMED",

  TRANSFORM_STRATEGY_CHANGED: "TRANSFORM.STRATEGY_CHANGED",
  TRANSFORM_REQUESTED: "TRANSFORM.REQUESTED",
  TRANSFORM_FAILED: "TRANSFORM.FAILED",

  INPUT_KEY_DOWN: "INPUT.KEY_DOWN",

  LOG_EVENT: "LOG.EVENT",
} as const;
