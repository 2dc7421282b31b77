/**
 * Effect platform layer selection
 *
 * Returns the layer that provides FileSystem, Path and the other platform
 * services to Effect programs run by the I/O modules.
 */

import { NodeContext } from "@effect/platform-node";

/**
 * Get the Effect platform layer for the current runtime
 *
 * @example
 * ```typescript
 * await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
 * ```
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}
