/**
 * Validated configuration plus which sources fed it.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ VIDEO_FPS: z._default(z.coerce.number(), 30) }),
 *   sources: [new JsonSource({ file: "settings.json", required: false }), new EnvSource()],
 * })
 *
 * config.value.VIDEO_FPS // 30
 * config.unknownKeys("json:settings.json") // e.g. ["OUTPUT_FOLDER"]
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  /** Sources that supplied at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys a source provided that the schema does not know, e.g. typos. Narrowed to one source by name. */
  unknownKeys(source?: string): string[]
}
