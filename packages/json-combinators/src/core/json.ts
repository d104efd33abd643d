// CHANGE: introduce the generic JSON tree every decoder narrows
// WHY: decoders read an already-parsed value and never see raw text
// SOURCE: n/a
// FORMAT THEOREM: ∀x ∈ Json: isFiniteJson(x) → isFiniteJson(x)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: Json is closed under array/object nesting with primitive leaves
// COMPLEXITY: O(1)/O(1)

export type Json =
  | null
  | boolean
  | number
  | string
  | ReadonlyArray<Json>
  | { readonly [key: string]: Json }

export type JsonObject = { readonly [key: string]: Json }

export type JsonArray = ReadonlyArray<Json>

export const isJsonArray = (value: Json): value is JsonArray => Array.isArray(value)

export const isJsonObject = (value: Json): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value)

/**
 * Own-property lookup: a key holding `null` is present, a missing key is absent.
 */
export const lookupKey = (value: JsonObject, key: string): Json | undefined =>
  Object.hasOwn(value, key) ? value[key] : undefined

/**
 * Whether a tree nests arrays/objects deeper than `maxDepth` levels.
 *
 * Accepts `unknown` so freshly parsed text can be checked before it is validated.
 *
 * @pure true
 * @invariant iterative and stops at the first node past `maxDepth`, so a cyclic value terminates
 * @complexity O(n) where n = number of nodes
 */
export const exceedsDepth = (root: unknown, maxDepth: number): boolean => {
  const stack: Array<{ readonly node: unknown; readonly depth: number }> = [{ node: root, depth: 0 }]
  for (let frame = stack.pop(); frame !== undefined; frame = stack.pop()) {
    const { depth, node } = frame
    if (typeof node !== "object" || node === null) {
      continue
    }
    const level = depth + 1
    if (level > maxDepth) {
      return true
    }
    const children: ReadonlyArray<unknown> = Array.isArray(node) ? node : Object.values(node)
    for (const child of children) {
      stack.push({ node: child, depth: level })
    }
  }
  return false
}

const MAX_NATIVE_INDENT = 10

/**
 * Print a tree as JSON text with `indent` spaces per level (0 = single line).
 *
 * `JSON.stringify` caps its gap at 10; wider indents re-expand a one-space print.
 * String contents never span lines, so every leading run of spaces is indentation.
 *
 * @throws TypeError when the value is circular
 */
export const printJson = (value: Json, indent: number): string =>
  indent <= MAX_NATIVE_INDENT
    ? JSON.stringify(value, null, indent)
    : JSON.stringify(value, null, 1).replace(/^ +/gmu, (lead) => " ".repeat(lead.length * indent))
