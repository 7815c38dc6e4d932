export type { Precision } from "./epsilon.js";
export {
  DEFAULT_EPSILON_MULTIPLE,
  DEFAULT_TOLERANCE,
  FLOAT32_EPSILON,
  FLOAT64_EPSILON,
  epsilonTolerance,
  isPrecision,
  machineEpsilon,
} from "./epsilon.js";

export type { CloseOptions, InfinityMode } from "./approxEqual.js";
export { approxEqual, isClose } from "./approxEqual.js";

export { cumulativeDrift, linspace, linspaceByIndex, samplesByIndex } from "./linspace.js";

export type { ToleranceConfig, ToleranceProfile } from "./config/types.js";
export type { LoadToleranceConfigOptions } from "./config/loadToleranceConfig.js";
export {
  DEFAULT_CONFIG_PATH,
  DEFAULT_TOLERANCE_CONFIG,
  loadToleranceConfig,
  parseToleranceConfig,
  resolveProfile,
} from "./config/loadToleranceConfig.js";

export { ConfigError } from "./util/errors.js";
export { InvalidArgumentError } from "@floatcmp/core";
