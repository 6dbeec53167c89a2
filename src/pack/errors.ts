/**
 * Upgrade pack and topology validation errors
 *
 * Validation collects every issue it finds before failing, so one run reports
 * all problems in a file.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ValidationErrorCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD_TYPE'
  | 'UNKNOWN_VALUE'
  | 'DUPLICATE_GROUP_NAME'
  | 'DUPLICATE_PACK_NAME'
  | 'INVALID_STACK_ID'
  | 'UNDEFINED_SERVICE';

export type PackLoadErrorCode = 'FILE_NOT_FOUND' | 'PARSE_ERROR' | 'INVALID_CONTENT';

// =============================================================================
// Validation Issue Types
// =============================================================================

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationIssue {
  /** Error code for programmatic handling */
  code: ValidationErrorCode;
  severity: ValidationSeverity;
  message: string;
  /** Path to the problematic field (e.g. "groups.upgrade[0].services[1]") */
  path: string;
  context?: Record<string, unknown>;
  suggestions?: string[];
}

export interface ValidationResult {
  /** No error-level issues */
  valid: boolean;
  issues: ValidationIssue[];
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

// =============================================================================
// Error Class
// =============================================================================

/**
 * Raised when an upgrade pack or cluster topology file cannot be used
 */
export class PackLoadError extends Error {
  constructor(
    message: string,
    public readonly code: PackLoadErrorCode,
    public readonly result: ValidationResult = validationFailure([]),
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PackLoadError';
  }

  /**
   * Format the validation errors for display
   */
  formatErrors(): string {
    return formatIssues(this.result.errors);
  }

  /**
   * Format all issues, warnings included
   */
  formatAll(): string {
    return formatIssues(this.result.issues);
  }
}

function formatIssues(issues: ValidationIssue[]): string {
  const lines: string[] = [];

  for (const issue of issues) {
    const prefix = issue.severity === 'error' ? '❌' : '⚠️';
    lines.push(`${prefix} [${issue.code}] ${issue.path}`);
    lines.push(`   ${issue.message}`);
    if (issue.suggestions?.length) {
      lines.push(`   Suggestions:`);
      for (const suggestion of issue.suggestions) {
        lines.push(`     • ${suggestion}`);
      }
    }
  }

  return lines.join('\n');
}

// =============================================================================
// Issue Builders
// =============================================================================

export function missingRequiredField(path: string, field: string): ValidationIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    severity: 'error',
    message: `Missing required field: "${field}"`,
    path,
    context: { field },
    suggestions: [`Add the required "${field}" field`],
  };
}

export function invalidFieldType(path: string, expected: string, actual: unknown): ValidationIssue {
  const actualType = actual === null ? 'null' : Array.isArray(actual) ? 'array' : typeof actual;
  return {
    code: 'INVALID_FIELD_TYPE',
    severity: 'error',
    message: `Expected ${expected} but found ${actualType}`,
    path,
    context: { expected, actual: actualType },
  };
}

export function unknownValue(
  path: string,
  value: unknown,
  allowed: readonly string[]
): ValidationIssue {
  return {
    code: 'UNKNOWN_VALUE',
    severity: 'error',
    message: `Unknown value "${String(value)}"`,
    path,
    context: { value, allowed },
    suggestions: [`Use one of: ${allowed.join(', ')}`],
  };
}

export function duplicateGroupName(
  path: string,
  name: string,
  existingPath: string
): ValidationIssue {
  return {
    code: 'DUPLICATE_GROUP_NAME',
    severity: 'error',
    message: `Group name "${name}" is already defined at "${existingPath}"`,
    path,
    context: { name, existingPath },
    suggestions: ['Rename one of the groups so names are unique per direction'],
  };
}

export function duplicatePackName(
  path: string,
  name: string,
  existingPath: string
): ValidationIssue {
  return {
    code: 'DUPLICATE_PACK_NAME',
    severity: 'error',
    message: `Upgrade pack "${name}" is already defined in "${existingPath}"`,
    path,
    context: { name, existingPath },
  };
}

export function invalidStackId(path: string, value: string): ValidationIssue {
  return {
    code: 'INVALID_STACK_ID',
    severity: 'error',
    message: `"${value}" is not a stack id of the form NAME-VERSION`,
    path,
    context: { value },
    suggestions: ['Write the stack as e.g. "HDP-2.3"'],
  };
}

/**
 * A group orders a service the pack has no processing for. Only rolling
 * packs need processing for every service, so this is a warning.
 */
export function undefinedService(path: string, serviceName: string): ValidationIssue {
  return {
    code: 'UNDEFINED_SERVICE',
    severity: 'warning',
    message: `Service "${serviceName}" has no processing entry and will be skipped by rolling upgrades`,
    path,
    context: { serviceName },
  };
}

// =============================================================================
// Result Builders
// =============================================================================

export function validationFailure(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === 'error');
  const warnings = issues.filter((i) => i.severity === 'warning');
  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  };
}
