import { CharsetTable } from "../charset-table"
import { InvalidCharsetError, UnknownCharacterError, UnknownCodeError } from "../errors"

describe("CharsetTable", () => {
  const abc = () => CharsetTable.create({ mapping: { a: 100, b: 101, c: 102 } })

  describe("create", () => {
    it("derives codeWidth from the largest code", () => {
      expect(abc().codeWidth).toBe(3)
      expect(CharsetTable.create({ mapping: { a: 0, b: 9 } }).codeWidth).toBe(1)
      expect(CharsetTable.create({ mapping: { a: 5, b: 1000 } }).codeWidth).toBe(4)
    })

    it("accepts a wider explicit codeWidth", () => {
      expect(CharsetTable.create({ mapping: { a: 100 }, codeWidth: 5 }).codeWidth).toBe(5)
    })

    it("accepts a Map as mapping", () => {
      const table = CharsetTable.create({ mapping: new Map([["x", 7]]) })

      expect(table.lookupCode("x")).toBe(7)
    })

    it("treats one astral code point as one character", () => {
      const table = CharsetTable.create({ mapping: { "😀": 100 } })

      expect(table.lookupCode("😀")).toBe(100)
    })

    it("carries metadata", () => {
      const table = CharsetTable.create({ mapping: { a: 1 }, author: "ops", timestamp: 42 })

      expect(table.author).toBe("ops")
      expect(table.timestamp).toBe(42)
      expect(abc().author).toBe("unknown")
      expect(abc().timestamp).toBeUndefined()
    })

    it("is frozen", () => {
      expect(Object.isFrozen(abc())).toBe(true)
    })
  })

  describe("validation", () => {
    it("rejects an empty mapping", () => {
      expect(() => CharsetTable.create({ mapping: {} })).toThrow(InvalidCharsetError)
    })

    it("rejects multi-character keys", () => {
      expect(() => CharsetTable.create({ mapping: { ab: 100 } })).toThrow(
        "Invalid charset: keys must be exactly one character",
      )
    })

    it("rejects empty keys", () => {
      expect(() => CharsetTable.create({ mapping: { "": 100 } })).toThrow(InvalidCharsetError)
    })

    it.each([-1, 1.5, Number.NaN])("rejects code %s", (code) => {
      expect(() => CharsetTable.create({ mapping: { a: code } })).toThrow(
        "Invalid charset: codes must be non-negative integers",
      )
    })

    it("rejects two characters sharing a code", () => {
      try {
        CharsetTable.create({ mapping: { a: 100, b: 100 } })
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidCharsetError)
        expect(err).toMatchObject({
          code: "invalid_charset",
          category: "configuration",
          context: { code: 100, chars: ["a", "b"] },
        })
      }
    })

    it("rejects a codeWidth narrower than the largest code", () => {
      expect(() => CharsetTable.create({ mapping: { a: 100 }, codeWidth: 2 })).toThrow(
        "Invalid charset: codeWidth must be an integer of at least 3",
      )
    })
  })

  describe("lookups", () => {
    it("maps characters to codes and back", () => {
      const table = abc()

      expect(table.lookupCode("b")).toBe(101)
      expect(table.lookupChar(102)).toBe("c")
      expect(table.hasChar("a")).toBe(true)
      expect(table.hasCode(103)).toBe(false)
    })

    it("throws UnknownCharacterError naming the character", () => {
      try {
        abc().lookupCode("x")
        expect.unreachable()
      } catch (err) {
        expect(err).toBeInstanceOf(UnknownCharacterError)
        expect(err).toMatchObject({
          char: "x",
          code: "unknown_character",
          context: { char: "x", codePoint: "U+0078" },
        })
      }
    })

    it("throws UnknownCodeError naming the code", () => {
      expect(() => abc().lookupChar(999)).toThrow(UnknownCodeError)
      expect(() => abc().lookupChar(999)).toThrow("Code 999 has no character in the charset")
    })
  })

  describe("views", () => {
    it("lists entries in code order", () => {
      const table = CharsetTable.create({
        mapping: new Map([
          ["c", 102],
          ["a", 100],
          ["b", 101],
        ]),
      })

      expect(table.entries()).toEqual([
        ["a", 100],
        ["b", 101],
        ["c", 102],
      ])
      expect(table.chars()).toEqual(["a", "b", "c"])
      expect(table.toMapping()).toEqual({ a: 100, b: 101, c: 102 })
      expect(table.size).toBe(3)
    })

    it("reports digit coverage", () => {
      const digits = Object.fromEntries([..."0123456789"].map((d, i) => [d, 200 + i]))

      expect(abc().coversDigits).toBe(false)
      expect(CharsetTable.create({ mapping: { ...digits, a: 100 } }).coversDigits).toBe(true)
    })

    it("is its own provider", () => {
      const table = abc()

      expect(table.current()).toBe(table)
    })
  })
})
