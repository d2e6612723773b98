import { jsonRoundTrip } from "../lib/json.js";
import { validateDataset, type ValidationIssue } from "../lib/validation.js";
import { requireStepInput, type PipelineContext } from "../pipeline/context.js";
import { ValidationFailure } from "../pipeline/errors.js";

export function runValidateStep(context: PipelineContext): void {
  const standardized = requireStepInput(context.standardized, "validate", "Standardized dataset");
  const info = requireStepInput(context.info, "validate", "Dataset info");

  // Checked as written to disk, where non-JSON values have already collapsed.
  const written = new Map<string, unknown[]>();
  for (const [split, records] of standardized.dataset) {
    written.set(split, records.map((record) => jsonRoundTrip(record)));
  }
  const issues = validateDataset(written, jsonRoundTrip(info));
  if (issues.length > 0) {
    throw new ValidationFailure(`Standardized output failed validation: ${formatIssues(issues)}`);
  }
  context.logger.info("Validation passed", { eventType: "validation" });
}

export function formatIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => `${issue.file}: ${issue.messages.join(" | ")}`)
    .join("; ");
}
