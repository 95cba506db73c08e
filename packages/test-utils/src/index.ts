export {
  FIXTURE_TIME,
  createDeviceProfile,
  createTestConfig,
  nextContextId,
  resetIdCounter,
} from "./factories.js";
export { ManualClock } from "./clock.js";
export { createRecordingLogger, type LogEntry, type RecordingLogger } from "./logger.js";
export { channel, gradientRgba, solidRgba, type Rgba } from "./buffers.js";
