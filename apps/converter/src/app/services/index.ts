import {
  type ConversionOverrides,
  type ConversionServices,
  createConversionServices,
} from "../../domains/conversion/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type DomainServices = {
  conversion: ConversionServices
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}

export type DomainOverrides = {
  conversion?: ConversionOverrides
}

export async function createDefaultDomainServices(
  config: AppConfig,
  core: CoreServices,
  overrides: DomainOverrides = {},
): Promise<DomainServices> {
  const conversion = await createConversionServices(config, core, overrides.conversion)

  return { conversion }
}
