export enum ConfigErrorCode {
  INVALID_JSON = 'INVALID_JSON',
  INVALID_SCHEMA = 'INVALID_SCHEMA',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
}

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: ConfigErrorCode, suggestion?: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export enum ValidationErrorCode {
  INVALID_DEFINITION = 'INVALID_DEFINITION',
  INVALID_REGEX = 'INVALID_REGEX',
  DUPLICATE_NAME = 'DUPLICATE_NAME',
  UNSCOPED_TOOL_FILTER = 'UNSCOPED_TOOL_FILTER',
  DANGLING_DEPENDENCY = 'DANGLING_DEPENDENCY',
  INCOMPATIBLE_DEPENDENCY = 'INCOMPATIBLE_DEPENDENCY',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
}

/**
 * A hook registry could not be built from its definitions
 */
export class ValidationError extends Error {
  public readonly code: ValidationErrorCode;
  /** The offending hook, when one can be named */
  public readonly hookName?: string;
  public readonly suggestion?: string;

  constructor(message: string, code: ValidationErrorCode, hookName?: string, suggestion?: string) {
    super(message);
    this.name = 'ValidationError';
    this.code = code;
    this.hookName = hookName;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class CyclicDependencyError extends ValidationError {
  /** Hook names along the cycle; the first name is repeated at the end */
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(
      `Cyclic hook dependency: ${cycle.join(' -> ')}`,
      ValidationErrorCode.CYCLIC_DEPENDENCY,
      cycle[0],
      'Remove one of the dependsOn links in the cycle.',
    );
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;

    Object.setPrototypeOf(this, CyclicDependencyError.prototype);
  }
}

/**
 * A condition could not be evaluated (e.g. the file is unreadable)
 */
export class ConditionEvaluationError extends Error {
  public readonly hookName: string;

  constructor(message: string, hookName: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConditionEvaluationError';
    this.hookName = hookName;

    Object.setPrototypeOf(this, ConditionEvaluationError.prototype);
  }
}

/**
 * The host cannot start processes at all (fork limits, file descriptors, memory)
 */
export class ResourceExhaustedError extends Error {
  public readonly hookName: string;
  public readonly errno?: string;

  constructor(message: string, hookName: string, errno?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResourceExhaustedError';
    this.hookName = hookName;
    this.errno = errno;

    Object.setPrototypeOf(this, ResourceExhaustedError.prototype);
  }
}
