import * as Either from "effect/Either"

import type { DecoderError } from "../../src/core/errors.js"

export const expectRight = <A, E>(result: Either.Either<A, E>): A => {
  if (Either.isLeft(result)) {
    throw new Error(`expected Right, got Left: ${JSON.stringify(result.left)}`)
  }
  return result.right
}

export const expectLeft = <A, E>(result: Either.Either<A, E>): E => {
  if (Either.isRight(result)) {
    throw new Error(`expected Left, got Right: ${String(result.right)}`)
  }
  return result.left
}

export const expectTag = <A>(result: Either.Either<A, DecoderError>): DecoderError["_tag"] => expectLeft(result)._tag
