import { glParameterName, silentLogger } from "@veilprint/core";
import type { ClockFn, ContextId, Logger } from "@veilprint/core";

import { categorize, isQueryCategory } from "./categories.js";
import type {
  DetectionPolicy,
  DetectionReport,
  DetectionRule,
  DetectorConfig,
  OperationRecord,
  UsageStats,
} from "./types.js";

const DEFAULT_HISTORY_CAPACITY = 100;

export const DEFAULT_SENSITIVE_PARAMETERS: readonly string[] = [
  "VENDOR",
  "RENDERER",
  "VERSION",
  "SHADING_LANGUAGE_VERSION",
];

export const DEFAULT_DETECTION_POLICY: Required<DetectionPolicy> = {
  readToDrawRatio: 2.0,
  sensitiveParameterThreshold: 3,
  consecutiveQueryLimit: 5,
  queriesPerRender: 10,
  queriesWithoutRender: 5,
  burstOperationThreshold: 10,
  burstWindowMs: 1000,
  sensitiveParameters: DEFAULT_SENSITIVE_PARAMETERS,
};

type Counters = Omit<UsageStats, "queriedParameters" | "sensitiveParameters">;

interface ContextUsage {
  counters: Counters;
  history: OperationRecord[];
  queriedParameters: string[];
  sensitiveParameters: Set<string>;
}

function emptyCounters(): Counters {
  return {
    draws: 0,
    reads: 0,
    imageDataReads: 0,
    dataUrlExports: 0,
    textOps: 0,
    parameterQueries: 0,
    extensionQueries: 0,
    shaderQueries: 0,
    bufferOps: 0,
    textureOps: 0,
    renderOps: 0,
    totalOperations: 0,
    currentQueryRun: 0,
    longestQueryRun: 0,
    firstOperationAt: null,
    lastOperationAt: null,
  };
}

/** Stats for a context that has recorded nothing. */
export function emptyUsageStats(): UsageStats {
  return { ...emptyCounters(), queriedParameters: [], sensitiveParameters: [] };
}

function pushBounded<T>(list: T[], item: T, capacity: number): void {
  list.push(item);
  if (list.length > capacity) {
    list.splice(0, list.length - capacity);
  }
}

type PolicyThreshold = Exclude<keyof DetectionPolicy, "sensitiveParameters">;

/** Fills every unset or invalid field of `policy` from the defaults. Thresholds must be finite and non-negative. */
function resolvePolicy(policy: DetectionPolicy, logger: Logger): Required<DetectionPolicy> {
  const threshold = (name: PolicyThreshold): number => {
    const value = policy[name];
    if (value === undefined) return DEFAULT_DETECTION_POLICY[name];
    if (Number.isFinite(value) && value >= 0) return value;
    logger.warn("Ignoring invalid detection threshold", { name, value });
    return DEFAULT_DETECTION_POLICY[name];
  };

  return {
    readToDrawRatio: threshold("readToDrawRatio"),
    sensitiveParameterThreshold: threshold("sensitiveParameterThreshold"),
    consecutiveQueryLimit: threshold("consecutiveQueryLimit"),
    queriesPerRender: threshold("queriesPerRender"),
    queriesWithoutRender: threshold("queriesWithoutRender"),
    burstOperationThreshold: threshold("burstOperationThreshold"),
    burstWindowMs: threshold("burstWindowMs"),
    sensitiveParameters: policy.sensitiveParameters ?? DEFAULT_DETECTION_POLICY.sensitiveParameters,
  };
}

/**
 * Tracks canvas and WebGL calls per context and classifies contexts whose
 * access pattern looks like fingerprinting.
 *
 * Counters are updated incrementally on `record`, so classification cost
 * does not grow with the history. State for a context is created lazily on
 * its first record and dropped by `forget`.
 *
 * Thread-safety: not thread-safe. Designed for single-threaded Node.js use.
 */
export class UsagePatternDetector {
  readonly policy: Readonly<Required<DetectionPolicy>>;

  private readonly _historyCapacity: number;
  private readonly _clock: ClockFn;
  private readonly _logger: Logger;
  private readonly _sensitive: ReadonlySet<string>;
  private readonly _usage = new Map<ContextId, ContextUsage>();

  constructor(config: DetectorConfig = {}) {
    this._logger = config.logger ?? silentLogger;
    this._clock = config.clock ?? Date.now;
    this.policy = resolvePolicy(config.policy ?? {}, this._logger);

    const capacity = config.historyCapacity;
    if (capacity !== undefined && Number.isSafeInteger(capacity) && capacity > 0) {
      this._historyCapacity = capacity;
    } else {
      if (capacity !== undefined) {
        this._logger.warn("Ignoring invalid history capacity", { value: capacity });
      }
      this._historyCapacity = DEFAULT_HISTORY_CAPACITY;
    }
    this._sensitive = new Set(this.policy.sensitiveParameters.map((p) => glParameterName(p)));
  }

  /**
   * Record one API call for `contextId`. GL enum parameters (`0x1F00`,
   * `7936`) are stored under their symbolic names.
   */
  record(contextId: ContextId, operation: string, parameter?: string | number): OperationRecord {
    const usage = this._usageFor(contextId);
    const counters = usage.counters;
    const timestamp = this._clock();
    const category = categorize(operation);
    const normalized = parameter === undefined || parameter === "" ? undefined : glParameterName(parameter);

    switch (category) {
      case "draw":
        counters.draws++;
        break;
      case "read":
        counters.reads++;
        if (operation === "getImageData") counters.imageDataReads++;
        else counters.dataUrlExports++;
        break;
      case "text":
        counters.textOps++;
        break;
      case "parameter-query":
        counters.parameterQueries++;
        if (normalized !== undefined) {
          pushBounded(usage.queriedParameters, normalized, this._historyCapacity);
          if (this._sensitive.has(normalized)) usage.sensitiveParameters.add(normalized);
        }
        break;
      case "extension-query":
        counters.extensionQueries++;
        break;
      case "shader-query":
        counters.shaderQueries++;
        break;
      case "buffer":
        counters.bufferOps++;
        break;
      case "texture":
        counters.textureOps++;
        break;
      case "render":
        counters.renderOps++;
        break;
      case "other":
        break;
    }

    if (isQueryCategory(category)) {
      counters.currentQueryRun++;
      counters.longestQueryRun = Math.max(counters.longestQueryRun, counters.currentQueryRun);
    } else if (category === "render") {
      counters.currentQueryRun = 0;
    }

    counters.totalOperations++;
    counters.firstOperationAt = counters.firstOperationAt ?? timestamp;
    counters.lastOperationAt = timestamp;

    const entry: OperationRecord =
      normalized === undefined
        ? { operation, category, timestamp }
        : { operation, parameter: normalized, category, timestamp };
    pushBounded(usage.history, entry, this._historyCapacity);
    return entry;
  }

  /** Evaluate every rule for `contextId`. Unknown contexts yield an empty, negative report. */
  analyze(contextId: ContextId): DetectionReport {
    const usage = this._usage.get(contextId);
    if (usage === undefined) {
      return { contextId, likelyFingerprinting: false, rules: [], stats: emptyUsageStats() };
    }

    const c = usage.counters;
    const p = this.policy;
    const rules: DetectionRule[] = [];

    if ((c.draws > 0 && c.reads / c.draws > p.readToDrawRatio) || (c.draws === 0 && c.reads >= 1)) {
      rules.push("read-heavy");
    }

    if (usage.sensitiveParameters.size >= p.sensitiveParameterThreshold) {
      rules.push("sensitive-parameters");
    }

    if (c.longestQueryRun > p.consecutiveQueryLimit) {
      rules.push("query-run");
    }

    const queries = c.parameterQueries + c.extensionQueries + c.shaderQueries;
    if (
      (c.renderOps > 0 && queries / c.renderOps > p.queriesPerRender) ||
      (c.renderOps === 0 && queries > p.queriesWithoutRender)
    ) {
      rules.push("query-to-render");
    }

    if (
      c.totalOperations > p.burstOperationThreshold &&
      c.firstOperationAt !== null &&
      c.lastOperationAt !== null &&
      c.lastOperationAt - c.firstOperationAt < p.burstWindowMs
    ) {
      rules.push("operation-burst");
    }

    return {
      contextId,
      likelyFingerprinting: rules.length > 0,
      rules,
      stats: this._snapshot(usage),
    };
  }

  isLikelyFingerprinting(contextId: ContextId): boolean {
    return this.analyze(contextId).likelyFingerprinting;
  }

  /** Record the call, then classify the context including it. */
  detectFingerprintingAttempt(contextId: ContextId, operation: string, parameter?: string | number): boolean {
    this.record(contextId, operation, parameter);
    return this.isLikelyFingerprinting(contextId);
  }

  /** Recorded operations for `contextId`, oldest first (at most `historyCapacity`). */
  history(contextId: ContextId): OperationRecord[] {
    return this._usage.get(contextId)?.history.map((entry) => ({ ...entry })) ?? [];
  }

  stats(contextId: ContextId): UsageStats {
    const usage = this._usage.get(contextId);
    return usage === undefined ? emptyUsageStats() : this._snapshot(usage);
  }

  /** Drop all state for `contextId`. Returns whether any existed. */
  forget(contextId: ContextId): boolean {
    return this._usage.delete(contextId);
  }

  clear(): void {
    this._usage.clear();
  }

  /** Contexts with recorded usage. */
  contexts(): ContextId[] {
    return [...this._usage.keys()];
  }

  private _usageFor(contextId: ContextId): ContextUsage {
    let usage = this._usage.get(contextId);
    if (usage === undefined) {
      usage = {
        counters: emptyCounters(),
        history: [],
        queriedParameters: [],
        sensitiveParameters: new Set(),
      };
      this._usage.set(contextId, usage);
      this._logger.debug("Tracking context usage", { contextId });
    }
    return usage;
  }

  private _snapshot(usage: ContextUsage): UsageStats {
    return {
      ...usage.counters,
      queriedParameters: [...usage.queriedParameters],
      sensitiveParameters: [...usage.sensitiveParameters],
    };
  }
}
