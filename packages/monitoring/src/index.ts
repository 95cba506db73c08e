// @veilprint/monitoring
// Process-wide protection statistics.

export {
  StatisticsAggregator,
  WELL_KNOWN_STATISTICS,
  type StatisticsConfig,
  type StatisticsListener,
  type StatisticsSnapshot,
  type WellKnownStatistic,
} from "./statistics.js";
