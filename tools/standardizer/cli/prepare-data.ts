import { PipelineError } from "../pipeline/errors.js";
import { runPrepareDatasetPipeline } from "../pipeline/prepare-dataset.js";
import { CliUsageError, parseCliArgs } from "./args.js";

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  const { info, outDir } = await runPrepareDatasetPipeline(options);
  console.log(`INFO: ${JSON.stringify(info)}`);
  console.log(`Saved to: ${outDir}`);
}

main().catch((error: unknown) => {
  if (error instanceof CliUsageError) {
    console.error(error.message);
    process.exit(1);
  }
  if (error instanceof PipelineError) {
    console.error(`Preparation failed [${error.code}]: ${error.message}`);
    process.exit(1);
  }
  console.error("Preparation failed:", error);
  process.exit(1);
});
