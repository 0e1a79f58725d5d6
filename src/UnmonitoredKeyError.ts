/**
 * @since 1.0.0
 */
import * as Data from "effect/Data"

/**
 * Raised by the per-key queries of a `Statistics` when the requested key is
 * not currently monitored.
 *
 * @since 1.0.0
 * @category errors
 */
export class UnmonitoredKeyError extends Data.TaggedError("UnmonitoredKeyError")<{
  readonly key: unknown
}> {}

/**
 * @since 1.0.0
 * @category refinements
 */
export const isUnmonitoredKeyError = (u: unknown): u is UnmonitoredKeyError => u instanceof UnmonitoredKeyError
