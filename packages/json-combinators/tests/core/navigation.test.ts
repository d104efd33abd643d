import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { badField, badPath, badPrimitive, badType, tooSmallArray } from "../../src/core/errors.js"
import { at, field, index } from "../../src/core/navigation.js"
import { int, string } from "../../src/core/primitives.js"
import { errorToString } from "../../src/core/render.js"
import { expectLeft, expectRight } from "./test-helpers.js"

describe("field", () => {
  it.effect("delegates to the inner decoder when the key is present", () =>
    Effect.sync(() => {
      expect(expectRight(field("name", string)({ name: "maxime" }))).toBe("maxime")
    }))

  it.effect("propagates the inner decoder's error unchanged", () =>
    Effect.sync(() => {
      expect(expectLeft(field("age", int)({ age: "25" }))).toEqual(badPrimitive("an int", "25"))
    }))

  it.effect("fails with BadField when the key is absent", () =>
    Effect.sync(() => {
      const input = { firstname: "maxime" }
      const error = expectLeft(field("age", int)(input))
      expect(error).toEqual(badField("an object with a field named `age`", input))
      expect(errorToString(error)).toBe(
        "Expecting an object with a field named `age` but instead got:\n{\n    \"firstname\": \"maxime\"\n}"
      )
    }))

  it.effect("treats an explicit null as present", () =>
    Effect.sync(() => {
      expect(expectLeft(field("age", int)({ age: null }))).toEqual(badPrimitive("an int", null))
    }))

  it.effect("fails with BadType on non-objects, arrays included", () =>
    Effect.sync(() => {
      expect(expectLeft(field("age", int)(5))).toEqual(badType("an object", 5))
      expect(expectLeft(field("age", int)([1]))).toEqual(badType("an object", [1]))
    }))
})

describe("at", () => {
  it.effect("walks nested objects", () =>
    Effect.sync(() => {
      expect(expectRight(at(["a", "b"], int)({ a: { b: 3 } }))).toBe(3)
    }))

  it.effect("matches nested field on the same input", () =>
    Effect.sync(() => {
      const input = { a: { b: "x" } }
      expect(at(["a", "b"], int)(input)).toEqual(field("a", field("b", int))(input))
    }))

  it.effect("cites the walked path when a non-object is reached", () =>
    Effect.sync(() => {
      expect(expectLeft(at(["a", "b"], int)({ a: 5 }))).toEqual(badType("an object at `a`", 5))
    }))

  it.effect("cites the full path and the missing segment", () =>
    Effect.sync(() => {
      const input = { a: {} }
      const error = expectLeft(at(["a", "b"], int)(input))
      expect(error).toEqual(badPath("an object with path `a.b`", input, "b"))
      expect(errorToString(error)).toBe(
        "Expecting an object with path `a.b` but instead got:\n{\n    \"a\": {}\n}\nNode `b` is unknown."
      )
    }))

  it.effect("decodes the root for an empty path", () =>
    Effect.sync(() => {
      expect(expectRight(at([], int)(7))).toBe(7)
    }))
})

describe("index", () => {
  it.effect("delegates to the requested element", () =>
    Effect.sync(() => {
      expect(expectRight(index(2, string)(["a", "b", "c"]))).toBe("c")
    }))

  it.effect("fails with TooSmallArray when the array is too short", () =>
    Effect.sync(() => {
      const input = ["a", "b"]
      const error = expectLeft(index(2, string)(input))
      expect(error).toEqual(
        tooSmallArray("a longer array. Need index `2` but there are only `2` entries", input)
      )
      expect(errorToString(error)).toBe(
        "Expecting a longer array. Need index `2` but there are only `2` entries.\n[\n    \"a\",\n    \"b\"\n]"
      )
    }))

  it.effect("rejects negative indices", () =>
    Effect.sync(() => {
      expect(expectLeft(index(-1, string)(["a"]))._tag).toBe("TooSmallArray")
    }))

  it.effect("fails with BadPrimitive on non-arrays", () =>
    Effect.sync(() => {
      expect(expectLeft(index(0, string)({ 0: "a" }))).toEqual(badPrimitive("an array", { 0: "a" }))
    }))
})
