import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  constructor(
    private readonly data: Readonly<T>,
    private readonly provenance: Record<string, string>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): T {
    return this.data
  }

  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance).filter((s) => s !== "default"))]
  }

  unknownKeys(source?: string): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.mergedKeys].filter(
      (k) => !known.has(k) && (source === undefined || this.provenance[k] === source),
    )
  }
}
