/**
 * Error types raised by the differential algebra and the rule protocol.
 * Looking up a function that has no rule is not an error and never throws.
 */

/**
 * Misuse of the rule generator, raised when the rule is declared.
 */
export class RuleDefinitionError extends Error {
  constructor(
    message: string,
    public functionName: string,
    public reason?: string
  ) {
    const reasonInfo = reason ? ` - ${reason}` : '';
    super(`Rule definition error for '${functionName}': ${message}${reasonInfo}`);
    this.name = 'RuleDefinitionError';
  }
}

/**
 * An operation on differentials that has no defined result,
 * e.g. multiplying two Wirtinger values.
 */
export class DifferentialAlgebraError extends Error {
  constructor(
    message: string,
    public operation: string,
    public operands: string[] = []
  ) {
    const operandInfo = operands.length > 0 ? ` (operands: ${operands.join(', ')})` : '';
    super(`Differential algebra error in '${operation}': ${message}${operandInfo}`);
    this.name = 'DifferentialAlgebraError';
  }
}

/**
 * Two or more registered rules are equally specific for one call.
 */
export class AmbiguousRuleError extends Error {
  constructor(
    public mode: string,
    public functionName: string,
    public candidates: string[]
  ) {
    super(
      `Ambiguous ${mode} for '${functionName}': ${candidates.length} equally specific rules match ` +
      `(${candidates.join(' | ')})`
    );
    this.name = 'AmbiguousRuleError';
  }
}
