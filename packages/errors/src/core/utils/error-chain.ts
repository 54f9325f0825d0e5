function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain and return every value encountered, outermost first.
 *
 * Stops at `maxDepth` entries or when a cycle is detected.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * Render a cause chain on one line for logs and debug output.
 *
 * @example
 * ```ts
 * describeChain(new Error("probe failed", { cause: new TypeError("bad json") }))
 * // "Error: probe failed <- TypeError: bad json"
 * ```
 */
export function describeChain(err: unknown, separator: string = " <- "): string {
  return errorChain(err)
    .map((entry) => {
      if (entry instanceof Error) return `${entry.name}: ${entry.message}`
      if (typeof entry === "string") return entry
      return String(entry)
    })
    .join(separator)
}
