import type { Json } from "./json.js"

// CHANGE: unify the failure algebra shared by every decoder
// WHY: keep failures as data so combinators can inspect and recover from them
// SOURCE: n/a
// FORMAT THEOREM: ∀e ∈ DecoderError: e._tag is stable and exhaustively matchable
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the variant set is closed; no error is rendered at construction time
// COMPLEXITY: O(1)/O(1)

export type BadPrimitive = {
  readonly _tag: "BadPrimitive"
  readonly expected: string
  readonly value: Json
}
export type BadPrimitiveExtra = {
  readonly _tag: "BadPrimitiveExtra"
  readonly expected: string
  readonly value: Json
  readonly reason: string
}
export type BadType = { readonly _tag: "BadType"; readonly expected: string; readonly value: Json }
export type BadField = { readonly _tag: "BadField"; readonly expected: string; readonly value: Json }
export type BadPath = {
  readonly _tag: "BadPath"
  readonly expected: string
  readonly value: Json
  readonly fieldName: string
}
export type TooSmallArray = {
  readonly _tag: "TooSmallArray"
  readonly expected: string
  readonly value: Json
}
export type FailMessage = { readonly _tag: "FailMessage"; readonly message: string }
export type BadOneOf = { readonly _tag: "BadOneOf"; readonly errors: ReadonlyArray<DecoderError> }
export type Direct = { readonly _tag: "Direct"; readonly message: string }

export type ShapeError = BadPrimitive | BadPrimitiveExtra | BadType

export type PresenceError = BadField | BadPath | TooSmallArray

export type DecoderError =
  | ShapeError
  | PresenceError
  | FailMessage
  | BadOneOf
  | Direct

export const badPrimitive = (expected: string, value: Json): BadPrimitive => ({
  _tag: "BadPrimitive",
  expected,
  value
})

export const badPrimitiveExtra = (
  expected: string,
  value: Json,
  reason: string
): BadPrimitiveExtra => ({
  _tag: "BadPrimitiveExtra",
  expected,
  value,
  reason
})

export const badType = (expected: string, value: Json): BadType => ({
  _tag: "BadType",
  expected,
  value
})

export const badField = (expected: string, value: Json): BadField => ({
  _tag: "BadField",
  expected,
  value
})

export const badPath = (expected: string, value: Json, fieldName: string): BadPath => ({
  _tag: "BadPath",
  expected,
  value,
  fieldName
})

export const tooSmallArray = (expected: string, value: Json): TooSmallArray => ({
  _tag: "TooSmallArray",
  expected,
  value
})

export const failMessage = (message: string): FailMessage => ({
  _tag: "FailMessage",
  message
})

export const badOneOf = (errors: ReadonlyArray<DecoderError>): BadOneOf => ({
  _tag: "BadOneOf",
  errors
})

export const direct = (message: string): Direct => ({
  _tag: "Direct",
  message
})

/** Runner rejection for input nested past the configured limit. */
export const depthExceeded = (maxDepth: number): Direct =>
  direct(`Given JSON exceeds the maximum nesting depth of ${maxDepth}`)

/**
 * The value was found but has the wrong primitive or structural kind.
 */
export const isShapeError = (error: DecoderError): error is ShapeError =>
  error._tag === "BadPrimitive" || error._tag === "BadPrimitiveExtra" || error._tag === "BadType"

/**
 * The requested field, path segment or array element does not exist.
 */
export const isPresenceError = (error: DecoderError): error is PresenceError =>
  error._tag === "BadField" || error._tag === "BadPath" || error._tag === "TooSmallArray"
