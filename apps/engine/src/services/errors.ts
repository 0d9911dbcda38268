/**
 * Error taxonomy for the rule engine.
 *
 * ValidationFailure and SoftValidationWarning describe failed checks and are
 * recorded on outcomes; the rest are thrown.
 */

export enum RuleEngineErrorType {
  VALIDATION_FAILURE = "VALIDATION_FAILURE",
  SOFT_VALIDATION_WARNING = "SOFT_VALIDATION_WARNING",
  CONFIGURATION_ERROR = "CONFIGURATION_ERROR",
  INVALID_CHUNK_CONFIG = "INVALID_CHUNK_CONFIG",
  DUPLICATE_RULE = "DUPLICATE_RULE",
  INVALID_RULE_DEFINITION = "INVALID_RULE_DEFINITION",
  UNKNOWN_RULE = "UNKNOWN_RULE",
}

export class RuleEngineError extends Error {
  constructor(
    message: string,
    public readonly type: RuleEngineErrorType,
    public readonly ruleId?: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RuleEngineError";
  }
}

/** A fatal validation rule rejected the input */
export class ValidationFailure extends RuleEngineError {
  constructor(ruleId: string, message: string, context?: Record<string, unknown>) {
    super(message, RuleEngineErrorType.VALIDATION_FAILURE, ruleId, context);
    this.name = "ValidationFailure";
  }
}

/** A non-fatal validation rule failed; the pipeline keeps going */
export class SoftValidationWarning extends RuleEngineError {
  constructor(ruleId: string, message: string, context?: Record<string, unknown>) {
    super(message, RuleEngineErrorType.SOFT_VALIDATION_WARNING, ruleId, context);
    this.name = "SoftValidationWarning";
  }
}

export class ConfigurationError extends RuleEngineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, RuleEngineErrorType.CONFIGURATION_ERROR, undefined, { issues });
    this.name = "ConfigurationError";
  }
}

export class InvalidChunkConfigError extends RuleEngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, RuleEngineErrorType.INVALID_CHUNK_CONFIG, undefined, context);
    this.name = "InvalidChunkConfigError";
  }
}

export class DuplicateRuleError extends RuleEngineError {
  constructor(ruleId: string) {
    super(`Rule already registered: ${ruleId}`, RuleEngineErrorType.DUPLICATE_RULE, ruleId);
    this.name = "DuplicateRuleError";
  }
}

export class InvalidRuleDefinitionError extends RuleEngineError {
  constructor(ruleId: string, message: string) {
    super(message, RuleEngineErrorType.INVALID_RULE_DEFINITION, ruleId);
    this.name = "InvalidRuleDefinitionError";
  }
}

export class UnknownRuleError extends RuleEngineError {
  constructor(ruleId: string) {
    super(`Rule not found: ${ruleId}`, RuleEngineErrorType.UNKNOWN_RULE, ruleId);
    this.name = "UnknownRuleError";
  }
}
