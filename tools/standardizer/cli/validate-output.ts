import { relative } from "path";
import { readStandardized } from "../io/save.js";
import { validateDataset } from "../lib/validation.js";
import { PipelineError } from "../pipeline/errors.js";

function main(): void {
  const outDir = process.argv[2];
  if (!outDir) {
    console.error("Usage: tsx tools/standardizer/cli/validate-output.ts <output-dir>");
    process.exit(1);
  }

  const stored = readStandardized(outDir);
  const issues = validateDataset(stored.splits, stored.info);

  const failed = new Set(issues.map((issue) => issue.file));
  for (const file of stored.files) {
    const relPath = relative(outDir, file);
    if (!failed.has(relPath)) {
      console.log(`OK   ${relPath}`);
    }
  }

  if (issues.length > 0) {
    for (const issue of issues) {
      console.error(`FAIL ${issue.file}`);
      for (const message of issue.messages) {
        console.error(`  ${message}`);
      }
    }
    console.error("\nValidation failed.");
    process.exit(1);
  }

  console.log("\nAll validations passed.");
}

try {
  main();
} catch (error) {
  if (error instanceof PipelineError) {
    console.error(`Validation failed [${error.code}]: ${error.message}`);
  } else {
    console.error("Validation failed:", error);
  }
  process.exit(1);
}
