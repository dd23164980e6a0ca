/**
 * Single Form Extraction Utility
 * Runs the extraction pipeline on a local PDF or JPEG and prints `{ form, report, metadata }`.
 *
 * Usage: npx tsx scripts/extract-form.ts <file_path> [--out result.json]
 */
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { getDefaultConfig } from "../src/config.js";
import { PipelineError, errorMessage } from "../src/errors.js";
import { createLogger } from "../src/logger.js";
import { FormExtractionPipeline } from "../src/pipeline.js";

const scriptDir = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(scriptDir, "../.env") });

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const outIndex = args.indexOf("--out");
  const outPath = outIndex !== -1 ? args[outIndex + 1] : undefined;
  const [filePath] = args.filter(
    (arg, i) => !arg.startsWith("--") && (outIndex === -1 || i !== outIndex + 1),
  );

  if (!filePath || (outIndex !== -1 && !outPath)) {
    console.log(
      "Usage: npx tsx scripts/extract-form.ts <file_path> [--out result.json]",
    );
    process.exit(1);
  }

  if (!fs.existsSync(filePath)) {
    console.error(`File not found: ${filePath}`);
    process.exit(1);
  }

  const config = getDefaultConfig();
  const pipeline = FormExtractionPipeline.fromConfig(
    config,
    createLogger("Pipeline", config.logLevel),
  );

  console.log(`File: ${filePath}`);
  const bytes = new Uint8Array(fs.readFileSync(filePath));
  const result = await pipeline.extract(bytes);
  const json = JSON.stringify(result, null, 2);

  if (outPath) {
    fs.writeFileSync(outPath, json + "\n");
    console.log(`Result written to ${outPath}`);
  } else {
    console.log(json);
  }

  console.log(
    `\nCompleteness: ${result.report.completeness_percent}% (${result.report.missing_fields.length} missing)`,
  );
}

main().catch((error: unknown) => {
  const stage = error instanceof PipelineError ? error.stage : "unknown";
  console.error(`Extraction failed at stage "${stage}": ${errorMessage(error)}`);
  process.exit(1);
});
