import { Match } from "effect"

import { DEFAULT_INDENT } from "./config.js"
import type { DecoderError } from "./errors.js"
import type { Json } from "./json.js"
import { printJson } from "./json.js"

// CHANGE: render decoder errors into human-readable messages on demand
// WHY: composition only moves error data around; text is produced by the final consumer
// SOURCE: n/a
// FORMAT THEOREM: ∀e: render(e) is deterministic for a fixed indent
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: rendering never throws, even for values that cannot be printed
// COMPLEXITY: O(n) where n = size of the offending value

/**
 * Print a value for an error message.
 *
 * @returns The printed text, or undefined when the value cannot be printed
 * (circular structure smuggled in through a cast).
 */
export const printValue = (value: Json, indent: number): string | undefined => {
  try {
    return printJson(value, indent)
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined
    }
    throw error
  }
}

const genericMessage = (
  expected: string,
  value: Json,
  newLine: boolean,
  indent: number
): string => {
  const separator = newLine ? "\n" : " "
  const printed = printValue(value, indent)
  if (printed === undefined) {
    return `Expecting ${expected} but decoder failed. Couldn't report given value due to circular structure.${separator}`
  }
  return `Expecting ${expected} but instead got:${separator}${printed}`
}

const renderTooSmallArray = (expected: string, value: Json, indent: number): string => {
  const printed = printValue(value, indent)
  return printed === undefined
    ? `Expecting ${expected}. Couldn't report given value due to circular structure.`
    : `Expecting ${expected}.\n${printed}`
}

/**
 * Convert a structured error into its multi-line message.
 *
 * @param error - Error produced by a decoder.
 * @param indent - Spaces per level for the value dump.
 * @returns Message text.
 *
 * @pure true
 * @invariant BadOneOf renders every sub-error, in trial order
 * @complexity O(n)
 */
export const errorToString = (error: DecoderError, indent: number = DEFAULT_INDENT): string =>
  Match.value(error).pipe(
    Match.tag("BadPrimitive", ({ expected, value }) => genericMessage(expected, value, false, indent)),
    Match.tag("BadType", ({ expected, value }) => genericMessage(expected, value, true, indent)),
    Match.tag(
      "BadPrimitiveExtra",
      ({ expected, reason, value }) => `${genericMessage(expected, value, false, indent)}\nReason: ${reason}`
    ),
    Match.tag("BadField", ({ expected, value }) => genericMessage(expected, value, true, indent)),
    Match.tag(
      "BadPath",
      ({ expected, fieldName, value }) =>
        `${genericMessage(expected, value, true, indent)}\nNode \`${fieldName}\` is unknown.`
    ),
    Match.tag("TooSmallArray", ({ expected, value }) => renderTooSmallArray(expected, value, indent)),
    Match.tag(
      "BadOneOf",
      ({ errors }) =>
        `I run into the following problems:\n\n${errors.map((inner) => errorToString(inner, indent)).join("\n")}`
    ),
    Match.tag("FailMessage", ({ message }) => `I run into a \`fail\` decoder.\n${message}`),
    Match.tag("Direct", ({ message }) => message),
    Match.exhaustive
  )
