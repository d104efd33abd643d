// CHANGE: public surface of the package
// WHY: callers import `Decode.*` and `Encode.*` namespaces from one entrypoint
// PURITY: CORE
// INVARIANT: every decoder and encoder is reachable from this module

export * as Decode from "./decode.js"
export * as Encode from "./core/encode.js"
export type { Json, JsonArray, JsonObject } from "./core/json.js"
export { decodeEffect, decodeStringEffect } from "./shell/effect.js"
