import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"
import * as Either from "effect/Either"
import { pipe } from "effect/Function"

import { Decode, Encode } from "../src/index.js"

interface Person {
  readonly name: string
  readonly age: number
}

const byBuilder: Decode.Decoder<Person> = Decode.object((get) => ({
  name: get.required.field("firstname", Decode.string),
  age: get.required.field("age", Decode.int)
}))

const byPipeline: Decode.Decoder<Person> = pipe(
  Decode.decode((name: string) => (age: number): Person => ({ name, age })),
  Decode.required("firstname", Decode.string),
  Decode.required("age", Decode.int)
)

const byMap: Decode.Decoder<Person> = Decode.map2(
  (name: string, age: number): Person => ({ name, age }),
  Decode.field("firstname", Decode.string),
  Decode.field("age", Decode.int)
)

describe("public surface", () => {
  it.effect("decodes the same record three ways", () =>
    Effect.sync(() => {
      const text = Encode.toString(
        0,
        Encode.object([["firstname", Encode.string("maxime")], ["age", Encode.int(25)]])
      )
      expect(text).toBe("{\"firstname\":\"maxime\",\"age\":25}")
      for (const decoder of [byBuilder, byPipeline, byMap]) {
        expect(Decode.decodeString(decoder, text)).toEqual(Either.right({ name: "maxime", age: 25 }))
      }
    }))

  it.effect("reports the missing field by name", () =>
    Effect.sync(() => {
      for (const decoder of [byBuilder, byPipeline, byMap]) {
        expect(Decode.decodeValue(decoder, { firstname: "maxime" })).toEqual(
          Either.left("Expecting an object with a field named `age` but instead got:\n{\n    \"firstname\": \"maxime\"\n}")
        )
      }
    }))

  it.effect("classifies errors", () =>
    Effect.sync(() => {
      expect(Decode.isPresenceError(Decode.badField("x", null))).toBe(true)
      expect(Decode.isShapeError(Decode.badType("x", null))).toBe(true)
      expect(Decode.isShapeError(Decode.tooSmallArray("x", []))).toBe(false)
    }))
})
