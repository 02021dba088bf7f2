export interface ValidationIssue {
  field: string;
  message: string;
  level?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Environment-style input: every value is an optional string
 */
export type RawEnv = Readonly<Record<string, string | undefined>>;
