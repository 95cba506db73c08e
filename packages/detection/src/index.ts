// @veilprint/detection
// Per-context usage tracking and fingerprinting heuristics.

export {
  DEFAULT_DETECTION_POLICY,
  DEFAULT_SENSITIVE_PARAMETERS,
  UsagePatternDetector,
  emptyUsageStats,
} from "./detector.js";
export { categorize, isQueryCategory } from "./categories.js";
export type {
  DetectionPolicy,
  DetectionReport,
  DetectionRule,
  DetectorConfig,
  OperationCategory,
  OperationRecord,
  UsageStats,
} from "./types.js";
