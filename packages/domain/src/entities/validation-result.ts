export interface ValidationFindings {
  readonly errors: string[];
  readonly warnings: string[];
}

export interface ValidationResult extends ValidationFindings {
  readonly valid: boolean;
}

export function toValidationResult(findings: ValidationFindings): ValidationResult {
  return {
    valid: findings.errors.length === 0,
    errors: [...findings.errors],
    warnings: [...findings.warnings],
  };
}
