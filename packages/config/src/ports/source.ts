/**
 * Loads raw configuration values. Validation, coercion and merging happen
 * downstream in `loadConfig`; later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. "env" or "json:settings.json". */
  readonly name: string

  /** An `undefined` value means the source does not provide that key. */
  load(): Promise<Record<string, unknown>>
}
