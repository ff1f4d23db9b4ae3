/**
 * @valuekit/derive - source emitters for equality contracts and enumerations
 */

export {
  defineEmitter,
  createEmitContext,
  memberAccess,
  stringLiteral,
  RuntimeImports,
  type Emitter,
  type EmitContext,
} from "./emitter.js";
export { EqualityEmitter, equalsFunctionName, hashFunctionName } from "./equality.js";
export { EnumerationEmitter, lookupName } from "./enumeration.js";
export { emitCompanionModule, type CompanionModuleInput } from "./module.js";
