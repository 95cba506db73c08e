import type { ContextId, ContextKind } from "./types.js";

/**
 * Mints context ids of the form `<kind>-<n>`.
 *
 * The counter only moves forward, so an id is never handed to a second
 * context for the lifetime of the allocator, even after the first context
 * has been destroyed.
 */
export class ContextIdAllocator {
  private _issued = 0;

  mint(kind: ContextKind = "frame"): ContextId {
    this._issued += 1;
    return `${kind}-${this._issued}`;
  }

  /** Number of ids minted so far. */
  get issued(): number {
    return this._issued;
  }
}
