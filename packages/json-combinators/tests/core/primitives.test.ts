import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { badPrimitive, badPrimitiveExtra } from "../../src/core/errors.js"
import { bool, float, int, string } from "../../src/core/primitives.js"
import { errorToString } from "../../src/core/render.js"
import { expectLeft, expectRight } from "./test-helpers.js"

describe("string", () => {
  it.effect("decodes a string", () =>
    Effect.sync(() => {
      expect(expectRight(string("maxime"))).toBe("maxime")
    }))

  it.effect("rejects a number with BadPrimitive", () =>
    Effect.sync(() => {
      expect(expectLeft(string(12))).toEqual(badPrimitive("a string", 12))
    }))
})

describe("int", () => {
  it.effect("decodes integers at both ends of the int32 range", () =>
    Effect.sync(() => {
      expect(expectRight(int(25))).toBe(25)
      expect(expectRight(int(-2147483648))).toBe(-2147483648)
      expect(expectRight(int(2147483647))).toBe(2147483647)
    }))

  it.effect("rejects out-of-range numbers with a reason", () =>
    Effect.sync(() => {
      expect(expectLeft(int(2147483648))).toEqual(
        badPrimitiveExtra("an int", 2147483648, "Value was either too large or too small for an int")
      )
    }))

  it.effect("rejects fractional numbers with a reason", () =>
    Effect.sync(() => {
      expect(expectLeft(int(1.5))).toEqual(badPrimitiveExtra("an int", 1.5, "Value is not an integral value"))
    }))

  it.effect("rejects non-numbers with a plain BadPrimitive", () =>
    Effect.sync(() => {
      const error = expectLeft(int("x"))
      expect(error).toEqual(badPrimitive("an int", "x"))
      expect(errorToString(error)).toBe("Expecting an int but instead got: \"x\"")
    }))
})

describe("bool and float", () => {
  it.effect("decode their own kinds", () =>
    Effect.sync(() => {
      expect(expectRight(bool(false))).toBe(false)
      expect(expectRight(float(1.2))).toBe(1.2)
    }))

  it.effect("reject other kinds", () =>
    Effect.sync(() => {
      expect(errorToString(expectLeft(bool(null)))).toBe("Expecting a boolean but instead got: null")
      expect(errorToString(expectLeft(float("1.2")))).toBe("Expecting a float but instead got: \"1.2\"")
    }))
})
