// CHANGE: define runner options and their defaults
// WHY: callers override only what they need; everything else falls back deterministically
// SOURCE: n/a
// FORMAT THEOREM: ∀k: resolve(opts).k = opts.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth ≥ 1 and resolved indent ≥ 0
// COMPLEXITY: O(1)/O(1)

export interface DecodeOptions {
  /** Deepest array/object nesting the runners accept (default 256). */
  readonly maxDepth?: number
  /** Spaces per level when printing the offending value in error messages (default 4). */
  readonly indent?: number
}

export interface ResolvedDecodeOptions {
  readonly maxDepth: number
  readonly indent: number
}

export const DEFAULT_MAX_DEPTH = 256
export const DEFAULT_INDENT = 4

const resolveMaxDepth = (options: DecodeOptions | undefined): number =>
  Math.max(1, Math.floor(options?.maxDepth ?? DEFAULT_MAX_DEPTH))

const resolveIndent = (options: DecodeOptions | undefined): number =>
  Math.max(0, Math.floor(options?.indent ?? DEFAULT_INDENT))

/**
 * Resolve runner options against the defaults.
 *
 * @param options - Caller-supplied overrides, if any.
 * @returns Fully populated options.
 *
 * @pure true
 * @invariant maxDepth ≥ 1
 * @complexity O(1)
 */
export const resolveDecodeOptions = (
  options: DecodeOptions | undefined
): ResolvedDecodeOptions => ({
  maxDepth: resolveMaxDepth(options),
  indent: resolveIndent(options)
})
