import { errorChain } from "./error-chain"

const ERRNO_PATTERN = /^E[A-Z0-9]+$/

/**
 * First Node.js system error code (`ENOENT`, `EACCES`, `ENOSPC`...) found along the
 * cause chain, or `undefined` when none of the errors came from a syscall.
 */
export function errnoCode(err: unknown): string | undefined {
  for (const entry of errorChain(err)) {
    if (typeof entry !== "object" || entry === null || !("code" in entry)) continue

    const code = entry.code

    if (typeof code === "string" && ERRNO_PATTERN.test(code)) return code
  }

  return undefined
}
