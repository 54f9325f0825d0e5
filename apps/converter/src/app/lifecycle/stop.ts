import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./lifecycle-hook"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  const { conversion } = context.services.domains

  return [
    {
      name: "stop:conversion:scheduler",
      fn: async () => {
        await conversion.scheduler.stop()
      },
    },
    {
      name: "stop:conversion:events",
      fn: async () => {
        conversion.conversionEvents.close()
        conversion.validationEvents.close()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
