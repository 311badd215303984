import type { ValidationIssue } from "@sensor-ingest/types";

// ─── Error Taxonomy ───────────────────────────────────────
// ConfigurationError → startup only, process exits
// ValidationError    → 422, nothing reaches the store
// StoreError         → 500, original error kept as `cause`

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super("Validation failed");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}
