/**
 * @valuekit/analyzer - reads equality contracts and enumerations from source
 */

export { cleanName, companionFor } from "./clean-name.js";
export { classifyClass, classifySourceFile, VALUE_OBJECT_BASE, WRAPPER_BASE, type ClassifyOptions } from "./classifier.js";
export { describeMemberType } from "./type-descriptor.js";
export {
  CONTRACT_MARKER,
  ENUMERATION_MARKER,
  isStrategyDecorator,
  readStrategies,
  readStrategy,
  strategyDecoratorText,
} from "./strategies.js";
export {
  compareEntries,
  validateContract,
  type ValidationOptions,
  type ValidationResult,
} from "./validator.js";
export {
  compareEnumerationEntries,
  ENUMERATION_BASE,
  extractEnumeration,
  extractEnumerations,
  validateEnumeration,
  type EnumerationValidationOptions,
  type EnumerationValidationResult,
} from "./enumeration.js";
export { applyEdits } from "./apply-edits.js";
export { collectClasses } from "./syntax.js";
