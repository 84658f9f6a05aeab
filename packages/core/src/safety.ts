/**
 * Runtime safety primitives.
 */

import { ExplicitBug } from "./errors.js";

/**
 * Mark a code path as unreachable. Pass the narrowed value so that adding a
 * variant to a union becomes a type error at every switch over it.
 */
export function unreachable(value: never, what = "value"): never {
  throw new ExplicitBug(`unexpected ${what}: ${JSON.stringify(value)}`);
}
