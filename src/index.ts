/**
 * diffrules - differentials and derivative rules for AD engines
 *
 * Rules are declared once and consumed by forward-mode (frule/pushforward)
 * and reverse-mode (rrule/pullback) engines alike.
 */

// Differential values
export {
  AbstractDifferential,
  Zero,
  One,
  DoesNotExist,
  Thunk,
  Wirtinger,
  NO_FIELDS,
  zero,
  one,
  dne,
  thunk,
  wirtinger,
  extern,
  force,
  wirtingerPrimal,
  wirtingerConjugate,
  primalPart,
  conjugatePart,
  isDifferential,
  isZero,
  isOne,
  isDoesNotExist,
  isThunk,
  isWirtinger
} from './core/Differentials.js';
export type { Differential, DifferentialKind, WirtingerPart } from './core/Differentials.js';
export { add, mul, sum, conj, differential } from './core/Arithmetic.js';

// Host values and domains
export { Complex } from './core/Complex.js';
export { isExtern, addValues, mulValues, conjValue } from './core/Numeric.js';
export type { Scalar, NumericArray, Extern } from './core/Numeric.js';
export { Domains } from './core/Domain.js';
export type { Domain, Field } from './core/Domain.js';

// Propagators
export {
  AbstractRule,
  Rule,
  DNERule,
  WirtingerRule,
  ruleForDomain,
  accumulate,
  accumulateInPlace,
  store
} from './rules/Propagators.js';
export type { Propagation, Updater } from './rules/Propagators.js';

// Rule lookup
export {
  RuleRegistry,
  Keywords,
  kwargs,
  defaultRuleRegistry,
  frule,
  rrule
} from './rules/RuleRegistry.js';
export type {
  PrimalFunction,
  Propagator,
  RuleMode,
  RuleResult,
  RuleImplementation,
  RuleRegistryOptions
} from './rules/RuleRegistry.js';
export { ArgTypeRegistry } from './rules/ArgTypes.js';
export type { ArgType, ArgTypeSpec, Signature } from './rules/ArgTypes.js';

// Rule generation
export { scalarRule, wirtingerPartial } from './rules/ScalarRule.js';
export type {
  RuleScope,
  PartialFn,
  PartialRow,
  ScalarRuleDeclaration,
  ScalarRuleWithSetup,
  ScalarRuleDefinition
} from './rules/ScalarRule.js';

// Rule verification
export { RuleChecker, formatRuleCheckResult } from './rules/RuleChecker.js';
export type { RuleCheckResult, RuleCheckError, RuleCheckerOptions } from './rules/RuleChecker.js';

// Errors
export { RuleDefinitionError, DifferentialAlgebraError, AmbiguousRuleError } from './core/Errors.js';
