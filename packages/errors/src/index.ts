export { BaseError, type BaseErrorOptions, type SerializeOptions, serializeError } from "./core/base-error"
export { describeChain, errorChain } from "./core/utils/error-chain"
export { errnoCode } from "./core/utils/errno-code"
export { isAppError } from "./core/utils/is-app-error"
export type * from "./ports/error"
