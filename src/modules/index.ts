/**
 * Pipeline modules export
 */

export { validate } from "./validator";
export { resolveFormat } from "./resolver";
export { build } from "./builder";
export { execute } from "./executor";
