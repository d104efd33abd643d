import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { badPrimitive } from "../../src/core/errors.js"
import { int, string } from "../../src/core/primitives.js"
import { array, dict, keyValuePairs, list } from "../../src/core/structural.js"
import { expectLeft, expectRight } from "./test-helpers.js"

describe("array and list", () => {
  it.effect("decode every element in order", () =>
    Effect.sync(() => {
      expect(expectRight(array(int)([1, 2, 3]))).toEqual([1, 2, 3])
      expect(expectRight(list(string)(["a", "b"]))).toEqual(["a", "b"])
      expect(expectRight(list(int)([]))).toEqual([])
    }))

  it.effect("stop at the first bad element", () =>
    Effect.sync(() => {
      expect(expectLeft(list(int)([1, 2, "x", true]))).toEqual(badPrimitive("an int", "x"))
    }))

  it.effect("reject non-arrays with their own description", () =>
    Effect.sync(() => {
      expect(expectLeft(array(int)({ a: 1 }))).toEqual(badPrimitive("an array", { a: 1 }))
      expect(expectLeft(list(int)("1,2"))).toEqual(badPrimitive("a list", "1,2"))
    }))
})

describe("keyValuePairs and dict", () => {
  it.effect("keep keys in insertion order", () =>
    Effect.sync(() => {
      expect(expectRight(keyValuePairs(int)({ b: 2, a: 1, c: 3 }))).toEqual([["b", 2], ["a", 1], ["c", 3]])
    }))

  it.effect("build a map from the pairs", () =>
    Effect.sync(() => {
      const decoded = expectRight(dict(int)({ a: 1, b: 2 }))
      expect([...decoded.keys()]).toEqual(["a", "b"])
      expect(decoded.get("b")).toBe(2)
    }))

  it.effect("reject arrays even though they are objects at runtime", () =>
    Effect.sync(() => {
      expect(expectLeft(keyValuePairs(int)([1, 2]))).toEqual(badPrimitive("an object", [1, 2]))
    }))

  it.effect("stop at the first bad value", () =>
    Effect.sync(() => {
      expect(expectLeft(dict(int)({ a: 1, b: "two", c: "three" }))).toEqual(badPrimitive("an int", "two"))
    }))
})
