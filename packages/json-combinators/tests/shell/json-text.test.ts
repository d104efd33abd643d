import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { badField, direct } from "../../src/core/errors.js"
import { isJsonObject } from "../../src/core/json.js"
import { field } from "../../src/core/navigation.js"
import { object } from "../../src/core/object.js"
import { int, string } from "../../src/core/primitives.js"
import { decodeString, decodeStringError, parseJsonText, toJson } from "../../src/shell/json-text.js"
import { expectLeft, expectRight } from "../core/test-helpers.js"

const person = object((get) => ({
  name: get.required.field("firstname", string),
  age: get.required.field("age", int)
}))

describe("parseJsonText", () => {
  it.effect("parses text into the JSON tree", () =>
    Effect.sync(() => {
      expect(expectRight(parseJsonText("{\"a\":[1,null,true]}"))).toEqual({ a: [1, null, true] })
    }))

  it.effect("keeps a __proto__ key as an own property", () =>
    Effect.sync(() => {
      const tree = expectRight(parseJsonText("{\"__proto__\":{\"x\":1},\"a\":1}"))
      expect(isJsonObject(tree) ? Object.keys(tree) : []).toEqual(["__proto__", "a"])
      expect(expectRight(decodeString(field("__proto__", string), "{\"__proto__\":\"v\"}"))).toBe("v")
    }))

  it.effect("rejects text nested past maxDepth", () =>
    Effect.sync(() => {
      expect(expectLeft(parseJsonText("[[[1]]]", { maxDepth: 2 }))).toEqual(
        direct("Given JSON exceeds the maximum nesting depth of 2")
      )
    }))
})

describe("decodeString", () => {
  it.effect("decodes valid text", () =>
    Effect.sync(() => {
      expect(expectRight(decodeString(person, "{\"firstname\":\"maxime\",\"age\":25}"))).toEqual({
        name: "maxime",
        age: 25
      })
    }))

  it.effect("reports invalid text as Direct", () =>
    Effect.sync(() => {
      const error = expectLeft(decodeStringError(int, "{\"firstname\":"))
      expect(error._tag).toBe("Direct")
      expect(expectLeft(decodeString(int, "{\"firstname\":"))).toMatch(/^Given an invalid JSON: /u)
    }))

  it.effect("returns Left for very deeply nested text", () =>
    Effect.sync(() => {
      const text = "[".repeat(20000) + "]".repeat(20000)
      expect(expectLeft(decodeString(int, text))).toBe("Given JSON exceeds the maximum nesting depth of 256")
    }))

  it.effect("keeps the structured error after parsing", () =>
    Effect.sync(() => {
      expect(expectLeft(decodeStringError(field("age", int), "{\"firstname\":\"maxime\"}"))).toEqual(
        badField("an object with a field named `age`", { firstname: "maxime" })
      )
    }))

  it.effect("renders with the requested indent", () =>
    Effect.sync(() => {
      expect(expectLeft(decodeString(field("age", int), "{\"firstname\":\"maxime\"}", { indent: 2 }))).toBe(
        "Expecting an object with a field named `age` but instead got:\n{\n  \"firstname\": \"maxime\"\n}"
      )
    }))
})

describe("toJson", () => {
  it.effect("accepts JSON-shaped values", () =>
    Effect.sync(() => {
      expect(expectRight(toJson({ a: [1, "b"] }))).toEqual({ a: [1, "b"] })
    }))

  it.effect("rejects values JSON cannot represent", () =>
    Effect.sync(() => {
      expect(expectLeft(toJson(undefined))._tag).toBe("Direct")
      expect(expectLeft(toJson({ count: 1n }))._tag).toBe("Direct")
    }))

  it.effect("rejects cyclic values without recursing", () =>
    Effect.sync(() => {
      const cycle: Array<unknown> = []
      cycle.push(cycle)
      expect(expectLeft(toJson(cycle, { maxDepth: 8 }))).toEqual(
        direct("Given JSON exceeds the maximum nesting depth of 8")
      )
    }))
})
