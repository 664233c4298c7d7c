#!/usr/bin/env tsx

import { Command, InvalidArgumentError } from "commander";
import path from "path";
import { executeLetterGeneration } from "./processFiles";
import { loadConfigFile } from "./config/config-loader";
import { formatErrorForUser } from "./core/error-handler";
import type { GenerateOptions } from "./types";

interface CliOptions {
  dir?: string;
  pattern?: string;
  template?: string;
  output?: string;
  config?: string;
  copy?: boolean;
  headerHeight?: string;
}

function parsePositiveNumber(value: string): string {
  if (!(Number(value) > 0)) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return value;
}

const program = new Command();

program
  .name("grant-letter")
  .description("Fill the bank letter template from grant agreement PDFs")
  .version("1.0.0")
  .option("-d, --dir <dir>", "directory with the agreements (default: current directory)")
  .option("-p, --pattern <pattern>", 'agreement file glob (default: "Grant Agreement*.pdf")')
  .option("-t, --template <path>", "letter template .docx")
  .option("-o, --output <dir>", "create output folders here instead of next to each agreement")
  .option("-c, --config <path>", "JSON file with generator options")
  .option("--copy", "copy agreements into their folders instead of moving them")
  .option(
    "--header-height <points>",
    "height of the page-1 band searched for the case number",
    parsePositiveNumber
  )
  .action(async (cmdOptions: CliOptions) => {
    let options: GenerateOptions = {};

    if (cmdOptions.config) {
      const loaded = loadConfigFile(path.resolve(cmdOptions.config));
      if (loaded.error) {
        console.error(formatErrorForUser(loaded.error));
        process.exit(1);
      }
      options = { ...loaded.options };
    }

    if (cmdOptions.dir) options.workDir = path.resolve(cmdOptions.dir);
    if (cmdOptions.pattern) options.sourcePattern = cmdOptions.pattern;
    if (cmdOptions.template) options.templatePath = path.resolve(cmdOptions.template);
    if (cmdOptions.output) options.outputDir = path.resolve(cmdOptions.output);
    if (cmdOptions.copy) options.moveSource = false;
    if (cmdOptions.headerHeight) options.headerCropHeight = Number(cmdOptions.headerHeight);

    const result = await executeLetterGeneration(options);

    console.log(
      `Generated ${result.generated.length}, skipped ${result.skipped.length}, failed ${result.errors.length}`
    );

    if (!result.success) {
      if (result.friendlyErrorMessage) {
        console.error(result.friendlyErrorMessage);
      }
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error("Letter generation failed:", error);
  process.exit(1);
});
