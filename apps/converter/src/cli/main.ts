import { type AppContext, type AppContextOptions, createAppContext } from "../app/create-context"
import { runHooks } from "../app/lifecycle/run-hooks"
import { describeError, formatErrorMessage } from "../domains/conversion/model/error-catalog"
import { type CliOptions, parseCliArgs, UsageError, usage } from "./args"
import { allSucceeded, convertFiles } from "./convert"
import { Reporter, type WriteLine } from "./reporter"

export const ExitCode = {
  ok: 0,
  failed: 1,
  fatal: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export type SignalSource = {
  once(event: "SIGINT", listener: () => void): unknown
  off(event: "SIGINT", listener: () => void): unknown
}

export type MainDeps = {
  argv: readonly string[]
  env?: Record<string, string | undefined>
  stdout?: WriteLine
  stderr?: WriteLine
  signals?: SignalSource
  /** Merged over the options built from the arguments */
  context?: Omit<AppContextOptions, "env" | "configOverrides" | "settingsFile">
  /** Budget for each lifecycle phase */
  hookBudgetMs?: number
}

const writeTo =
  (stream: NodeJS.WriteStream): WriteLine =>
  (line) => {
    stream.write(`${line}\n`)
  }

export async function main(deps: MainDeps): Promise<ExitCode> {
  const stdout = deps.stdout ?? writeTo(process.stdout)
  const stderr = deps.stderr ?? writeTo(process.stderr)

  let options: CliOptions

  try {
    options = parseCliArgs(deps.argv)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    stderr(err.message)
    stderr(usage)
    return ExitCode.fatal
  }

  if (options.help) {
    stdout(usage)
    return ExitCode.ok
  }

  if (options.files.length === 0) {
    stderr("No input files given")
    stderr(usage)
    return ExitCode.fatal
  }

  let ctx: AppContext

  try {
    ctx = await createAppContext({
      ...deps.context,
      env: deps.env ?? process.env,
      configOverrides: options.overrides,
      ...(options.settingsFile !== undefined && { settingsFile: options.settingsFile }),
    })
  } catch (err) {
    stderr(formatErrorMessage(describeError(err), { includeTechnical: options.verbose }))
    return ExitCode.fatal
  }

  return run(ctx, options, { ...deps, stdout, stderr })
}

async function run(
  ctx: AppContext,
  options: CliOptions,
  deps: MainDeps & { stdout: WriteLine; stderr: WriteLine },
): Promise<ExitCode> {
  const { clock, logger } = ctx.services.core
  const { conversion } = ctx.services.domains
  const budgetMs = deps.hookBudgetMs ?? 30_000

  const started = await runHooks(ctx.createStartHooks(ctx), {
    phase: "start",
    clock,
    logger,
    budgetMs,
    failFast: true,
  })

  const startFailure = started.failures[0]
  if (startFailure) {
    deps.stderr(
      formatErrorMessage(describeError(startFailure.error), { includeTechnical: options.verbose }),
    )
    return ExitCode.fatal
  }

  const signals: SignalSource = deps.signals ?? process
  const onInterrupt = () => {
    logger.warn("Interrupted, cancelling conversions")
    conversion.scheduler.cancelAll()
    conversion.conversionEvents.close()
  }
  signals.once("SIGINT", onInterrupt)

  const reporter = new Reporter(deps.stdout, { verbose: options.verbose, progressStep: 10 })

  try {
    const summary = await convertFiles(options.files, conversion, reporter)
    logger.info("Run finished", { ...summary })

    return allSucceeded(summary) ? ExitCode.ok : ExitCode.failed
  } finally {
    signals.off("SIGINT", onInterrupt)
    await runHooks(ctx.createStopHooks(ctx), { phase: "stop", clock, logger, budgetMs })
  }
}
