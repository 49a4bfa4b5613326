/**
 * The thrown value followed by its `cause`, that cause's `cause` and so on.
 * Ends at the first value without a cause, at a value seen before, or after
 * `maxDepth` entries. Empty for `null` and `undefined`.
 */
export function errorChain(err: unknown, maxDepth = 32): unknown[] {
  const chain: unknown[] = []
  const seen = new Set<unknown>()

  for (let current = err; current != null && chain.length < maxDepth; ) {
    if (seen.has(current)) break
    seen.add(current)
    chain.push(current)

    if (typeof current !== "object" || !("cause" in current)) break
    current = current.cause
  }

  return chain
}
