import { BaseError } from "../../base-error"
import { errnoCode } from "../errno-code"

function systemError(code: string): Error {
  return Object.assign(new Error(`${code}: failed`), { code })
}

describe("errnoCode", () => {
  it("reads the code of a system error", () => {
    expect(errnoCode(systemError("EACCES"))).toBe("EACCES")
  })

  it("finds the code further down the cause chain", () => {
    const wrapped = new BaseError("stat failed", {
      code: "unexpected",
      cause: systemError("ENOENT"),
    })

    expect(errnoCode(wrapped)).toBe("ENOENT")
  })

  it("ignores application codes that are not errno codes", () => {
    const err = new BaseError("no file", { code: "file_not_found" })

    expect(errnoCode(err)).toBeUndefined()
  })

  it("returns undefined for non-objects", () => {
    expect(errnoCode("ENOENT")).toBeUndefined()
    expect(errnoCode(undefined)).toBeUndefined()
  })
})
