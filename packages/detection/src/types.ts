import type { ClockFn, ContextId, Logger } from "@veilprint/core";

export type OperationCategory =
  | "draw"
  | "read"
  | "text"
  | "parameter-query"
  | "extension-query"
  | "shader-query"
  | "buffer"
  | "texture"
  | "render"
  | "other";

/** One recorded API call. */
export interface OperationRecord {
  operation: string;
  /** Normalised parameter name, when the call carried one. */
  parameter?: string;
  category: OperationCategory;
  /** ms epoch from the detector's clock. */
  timestamp: number;
}

export interface UsageStats {
  draws: number;
  reads: number;
  imageDataReads: number;
  dataUrlExports: number;
  textOps: number;
  parameterQueries: number;
  extensionQueries: number;
  shaderQueries: number;
  bufferOps: number;
  textureOps: number;
  renderOps: number;
  totalOperations: number;
  /** Parameters passed to getParameter, oldest first, bounded like the history. */
  queriedParameters: string[];
  /** Distinct sensitive parameters seen so far. */
  sensitiveParameters: string[];
  /** Query operations since the last render operation. */
  currentQueryRun: number;
  longestQueryRun: number;
  firstOperationAt: number | null;
  lastOperationAt: number | null;
}

export type DetectionRule =
  | "read-heavy"
  | "sensitive-parameters"
  | "query-run"
  | "query-to-render"
  | "operation-burst";

export interface DetectionReport {
  contextId: ContextId;
  likelyFingerprinting: boolean;
  /** Rules that fired, in evaluation order. */
  rules: DetectionRule[];
  stats: UsageStats;
}

/** Thresholds for the detection rules. All fields optional; see defaults in detector.ts. */
export interface DetectionPolicy {
  /** Default: 2.0 */
  readToDrawRatio?: number;
  /** Default: 3 */
  sensitiveParameterThreshold?: number;
  /** Default: 5 */
  consecutiveQueryLimit?: number;
  /** Default: 10 */
  queriesPerRender?: number;
  /** Default: 5 */
  queriesWithoutRender?: number;
  /** Default: 10 */
  burstOperationThreshold?: number;
  /** Default: 1000 */
  burstWindowMs?: number;
  /** Parameter names treated as sensitive. Default: VENDOR, RENDERER, VERSION, SHADING_LANGUAGE_VERSION */
  sensitiveParameters?: readonly string[];
}

export interface DetectorConfig {
  policy?: DetectionPolicy;
  /** Max records kept per context. Default: 100 */
  historyCapacity?: number;
  clock?: ClockFn;
  logger?: Logger;
}
