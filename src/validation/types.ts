import type { Configuration } from '$types/config';

export interface ValidationError {
  /** Dotted path of the offending key, e.g. "influxdb.port" */
  field: string;
  message: string;
}

export interface ValidationWarning {
  field: string;
  message: string;
}

export type ValidationResult =
  | { valid: true; config: Configuration; warnings: ValidationWarning[] }
  | { valid: false; errors: ValidationError[]; warnings: ValidationWarning[] };
