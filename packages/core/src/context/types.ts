/** Injectable clock returning ms since epoch. */
export type ClockFn = () => number;

/**
 * Stable logical identity of a browsing context (frame, canvas element,
 * WebGL context, audio context). Minted once per context by
 * `ContextIdAllocator`, or supplied by the binding when it already owns a
 * stable id.
 */
export type ContextId = string;

export type ContextKind = "frame" | "canvas" | "webgl" | "audio";
