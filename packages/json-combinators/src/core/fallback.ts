import * as Either from "effect/Either"

import type { Decoder } from "./decoder.js"
import { isPresenceError } from "./errors.js"
import type { Json } from "./json.js"

// CHANGE: share the "absent or null → fallback" rule between pipeline and object builder
// WHY: optional fields must not hide malformed data
// SOURCE: n/a
// FORMAT THEOREM: locate(v) = Left(e) ∧ isPresenceError(e) → Right(fallback)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: shape errors from `locate` and every error from `decoder` propagate unchanged
// COMPLEXITY: O(1) beyond the wrapped decoders

/**
 * Locate a node with `locate`, then decode it with `decoder`.
 *
 * @param locate - Navigation decoder returning the raw node (e.g. `field(name, value)`).
 * @param decoder - Decoder for the node when it is present and not `null`.
 * @param fallback - Result when the node is absent or `null`.
 *
 * @pure true
 */
export const withFallback = <A>(locate: Decoder<Json>, decoder: Decoder<A>, fallback: A): Decoder<A> =>
(input) => {
  const located = locate(input)
  if (Either.isLeft(located)) {
    return isPresenceError(located.left) ? Either.right(fallback) : Either.left(located.left)
  }
  return located.right === null ? Either.right(fallback) : decoder(located.right)
}
