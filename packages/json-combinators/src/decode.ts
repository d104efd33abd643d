export { andThen, oneOf, option } from "./core/combinators.js"
export { type DecodeOptions, resolveDecodeOptions } from "./core/config.js"
export { type Decoder, type DecoderType, fail, lazy, nil, run, succeed, value } from "./core/decoder.js"
export * from "./core/errors.js"
export {
  bigint,
  type DateTimeOffset,
  datetime,
  datetimeOffset,
  decimal,
  Guid,
  guid,
  int64,
  uint64
} from "./core/extended.js"
export { map, map2, map3, map4, map5, map6, map7, map8 } from "./core/map.js"
export { at, field, index } from "./core/navigation.js"
export { type Getters, object, type OptionalGetter, type RequiredGetter } from "./core/object.js"
export { custom, decode, hardcoded, optional, optionalAt, required, requiredAt, resolve } from "./core/pipeline.js"
export { bool, float, int, string } from "./core/primitives.js"
export { errorToString } from "./core/render.js"
export { DecodeError, decodeValue, decodeValueError, unwrap } from "./core/runners.js"
export { array, dict, keyValuePairs, list } from "./core/structural.js"
export { decodeString, decodeStringError, parseJsonText, toJson } from "./shell/json-text.js"
