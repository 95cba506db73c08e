// @veilprint/core
// Configuration model, context identity, and shared utilities.

export * from "./config/index.js";
export * from "./profiles/index.js";

export type { ClockFn, ContextId, ContextKind } from "./context/types.js";
export { ContextIdAllocator } from "./context/allocator.js";

export {
  TypedEventEmitter,
  type ListenerErrorHandler,
  type TypedEventEmitterOptions,
} from "./events/emitter.js";

export {
  createLogger,
  isLogLevel,
  parseLogLevel,
  silentLogger,
  type LogContext,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from "./logging/logger.js";

export { ConfigValidationError, EnvironmentConfigError, VeilprintError } from "./errors.js";

export {
  GL,
  glEnumValue,
  glParameterName,
  isGLParameterName,
  type GLParameterName,
} from "./gl/constants.js";
