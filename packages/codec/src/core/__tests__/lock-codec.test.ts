import { CharsetHolder, CharsetTable, TableNotInitializedError } from "@digilock/charset"
import type { Logger } from "@digilock/logger"
import { type MockProxy, mock } from "vitest-mock-extended"
import {
  BatchItemError,
  EmptyLockSequenceError,
  InvalidLockError,
  LockRequiredError,
} from "../errors"
import { createLockCodec } from "../lock-codec"
import { lettersAndDigitsTable, lettersTable } from "./tables"

describe("createLockCodec", () => {
  let logger: MockProxy<Logger>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  describe("locks", () => {
    it("falls back to the default lock", () => {
      const codec = createLockCodec({ charset: lettersTable(), defaultLock: 1 })

      expect(codec.defaultLock).toBe(1)
      expect(codec.encodeData("abc")).toBe("101102103")
      expect(codec.decodeData("101102103")).toBe("abc")
      expect(codec.encodeBatch(["abc", "def", "ghi"])).toEqual([
        "101102103",
        "104105106",
        "107108109",
      ])
    })

    it("prefers an explicit lock over the default", () => {
      const codec = createLockCodec({ charset: lettersTable(), defaultLock: 1 })

      expect(codec.encodeData("a", 0)).toBe("100")
      expect(codec.decodeBatch(["102"], 2)).toEqual(["a"])
    })

    it("requires a lock when there is no default", () => {
      const codec = createLockCodec({ charset: lettersTable() })

      expect(codec.defaultLock).toBeUndefined()
      expect(() => codec.encodeData("abc")).toThrow(LockRequiredError)
      expect(() => codec.tryDecodeBatch(["101"])).toThrow(LockRequiredError)
    })

    it("rejects an invalid default lock at construction", () => {
      expect(() => createLockCodec({ charset: lettersTable(), defaultLock: 0.5 })).toThrow(
        InvalidLockError,
      )
    })
  })

  it("exposes convert, collect-all batch and multi-lock operations", () => {
    const codec = createLockCodec({ charset: lettersAndDigitsTable(), defaultLock: 1 })

    expect(codec.convertData("101102103", 1, 2)).toBe("102103104")
    expect(codec.tryEncodeBatch(["a", "z"]).map((r) => r.ok)).toEqual([true, false])
    expect(codec.mDecode([3, 4], codec.mEncode([3, 4], "hi"))).toBe("hi")
    expect(() => codec.mEncode([], "hi")).toThrow(EmptyLockSequenceError)
  })

  describe("charset provider", () => {
    it("fails with TableNotInitializedError while the holder is empty", () => {
      const holder = new CharsetHolder()
      const codec = createLockCodec({ charset: holder, defaultLock: 1 })

      expect(() => codec.encodeData("a")).toThrow(TableNotInitializedError)

      holder.replace(lettersTable())

      expect(codec.encodeData("a")).toBe("101")
    })

    it("picks up a replaced table on the next call", () => {
      const holder = new CharsetHolder(lettersTable())
      const codec = createLockCodec({ charset: holder, defaultLock: 0 })

      expect(codec.encodeData("a")).toBe("100")

      holder.replace(CharsetTable.create({ mapping: { a: 500 } }))

      expect(codec.encodeData("a")).toBe("500")
    })
  })

  describe("logging", () => {
    it("logs one debug event per successful call", () => {
      const codec = createLockCodec({ charset: lettersAndDigitsTable(), logger, defaultLock: 1 })

      codec.encodeData("abc")

      expect(logger.debug).toHaveBeenCalledTimes(1)
      expect(logger.debug).toHaveBeenCalledWith("encodeData succeeded", {
        operation: "encodeData",
        charset: "test",
        lock: 1,
        chars: 3,
        groups: 3,
      })
      expect(logger.warn).not.toHaveBeenCalled()
    })

    it("reports item counts for batch calls", () => {
      const codec = createLockCodec({ charset: lettersTable(), logger })

      codec.tryEncodeBatch(["ab", "zz", "c"], 2)

      expect(logger.debug).toHaveBeenCalledWith("tryEncodeBatch succeeded", {
        operation: "tryEncodeBatch",
        charset: "unknown",
        lock: 2,
        items: 3,
        failed: 1,
      })
    })

    it("reports the lock sequence for layered calls", () => {
      const codec = createLockCodec({ charset: lettersAndDigitsTable(), logger })

      codec.mEncode([1, 2], "a")

      expect(logger.debug).toHaveBeenCalledWith("mEncode succeeded", {
        operation: "mEncode",
        charset: "test",
        locks: [1, 2],
        chars: 1,
        groups: 3,
      })
    })

    it("logs a warning with the error code and category on failure", () => {
      const codec = createLockCodec({ charset: lettersTable(), logger })

      expect(() => codec.encodeBatch(["a", "z"], 1)).toThrow(BatchItemError)

      expect(logger.warn).toHaveBeenCalledTimes(1)
      expect(logger.warn).toHaveBeenCalledWith("encodeBatch failed", {
        operation: "encodeBatch",
        code: "batch_item_failed",
        category: "configuration",
        err: expect.any(BatchItemError),
      })
      expect(logger.debug).not.toHaveBeenCalled()
    })

    it("logs usage errors the same way", () => {
      const codec = createLockCodec({ charset: lettersTable(), logger })

      expect(() => codec.decodeData("101")).toThrow(LockRequiredError)

      expect(logger.warn).toHaveBeenCalledWith("decodeData failed", {
        operation: "decodeData",
        code: "lock_required",
        category: "usage",
        err: expect.any(LockRequiredError),
      })
    })
  })
})
