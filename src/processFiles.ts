/**
 * Batch letter generation
 * Finds agreements, extracts their fields, fills the template and files the
 * results. Each agreement is handled independently; a failure is reported and
 * the batch moves on.
 */

import fs from "fs";
import path from "path";
import { glob } from "glob";
import type {
  GenerateOptions,
  GeneratedLetterRecord,
  GenerationResult,
  SkippedFileRecord,
  SourceDocumentReader,
} from "./types";
import type { NormalizedGenerateOptions } from "./core/config-normalizer";
import { normalizeConfig } from "./core/config-normalizer";
import { ConfigDetector } from "./config/config-detector";
import type { GenerationError } from "./core/error-handler";
import {
  createGenerationError,
  enhanceError,
  formatErrorForUser,
  logError,
} from "./core/error-handler";
import { findSelfReferencingTokens } from "./core/token-map";
import { renderTokens } from "./core/run-span-replacer";
import { findUnresolvedTokens, replaceAll } from "./core/tree-walker";
import { readDocxTemplate } from "./adapters/docx-template";
import { PdfSourceReader } from "./adapters/pdf-source-reader";
import { extractAgreementFields, listMissingFields } from "./extraction/field-extractors";
import type { RequiredField } from "./extraction/field-extractors";
import { buildPlaceholderMap, toLetterValues } from "./extraction/placeholder-builder";

const FIELD_LABELS: Record<RequiredField, string> = {
  caseNumber: "case number (CASE_NUM)",
  amount: "amount (FULL_AMOUNT)",
  date: "date (DATE)",
};

export type FileOutcome =
  | { status: "generated"; record: GeneratedLetterRecord }
  | { status: "skipped"; record: SkippedFileRecord }
  | { status: "failed"; error: GenerationError };

function createReader(config: NormalizedGenerateOptions): SourceDocumentReader {
  return (
    config.reader ??
    new PdfSourceReader({
      headerCropHeight: config.headerCropHeight,
      xTolerance: config.xTolerance,
      yTolerance: config.yTolerance,
    })
  );
}

/**
 * Moves a file, falling back to copy + unlink across devices
 */
export function moveFile(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "EXDEV") {
      fs.copyFileSync(from, to);
      fs.unlinkSync(from);
      return;
    }
    throw error;
  }
}

/**
 * Handles one agreement: extract, fill, write, and file the source
 */
export async function processSourceFile(
  sourcePath: string,
  config: NormalizedGenerateOptions,
  reader: SourceDocumentReader = createReader(config)
): Promise<FileOutcome> {
  const { logger } = config;
  const sourceName = path.basename(sourcePath);
  logger.log(`🔎 Processing: ${sourceName}`);

  const fields = extractAgreementFields(await reader.read(sourcePath));
  const missing = listMissingFields(fields);
  const values = toLetterValues(fields);

  if (missing.length > 0 || !values) {
    const detail = missing.map((field) => FIELD_LABELS[field]).join("; ");
    logError(createGenerationError("EXTRACT001", [detail], { filePath: sourcePath }), logger);
    logger.log(`⛔ Skipping ${sourceName}`);
    return {
      status: "skipped",
      record: { sourcePath, reason: "missing-fields", detail },
    };
  }

  if (!fields.purpose) {
    logger.warn("⚠️  Purpose (CASE_DESCR) not found, it will be left empty");
  }

  const tokenMap = buildPlaceholderMap(values, config.extraPlaceholders);
  const hazards = findSelfReferencingTokens(tokenMap);
  if (hazards.length > 0) {
    const described = hazards.map(([key, inner]) => `${key} contains ${inner}`);
    return {
      status: "failed",
      error: createGenerationError("CONFIG003", [described.join(", ")], {
        filePath: sourcePath,
      }),
    };
  }

  const folderName = renderTokens(config.folderNameTemplate, tokenMap);
  const outputDir = path.join(config.outputDir ?? path.dirname(sourcePath), folderName);

  if (fs.existsSync(outputDir)) {
    logError(createGenerationError("FILE003", [outputDir], { filePath: sourcePath }), logger);
    return {
      status: "skipped",
      record: { sourcePath, reason: "output-folder-exists", detail: outputDir },
    };
  }

  // the letter is complete in memory before the folder exists; a failure
  // after mkdir removes the folder again
  const template = await readDocxTemplate(config.templatePath);
  const replacements = replaceAll(template.document, tokenMap);
  const unresolvedTokens = findUnresolvedTokens(
    template.document,
    config.placeholderPattern
  );
  if (unresolvedTokens.length > 0) {
    logError(
      createGenerationError("TEMPLATE003", [unresolvedTokens.join(", ")], {
        filePath: config.templatePath,
      }),
      logger
    );
  }
  const letterBytes = await template.save();
  const letterPath = path.join(
    outputDir,
    renderTokens(config.letterFileNameTemplate, tokenMap)
  );

  fs.mkdirSync(outputDir, { recursive: true });
  try {
    fs.writeFileSync(letterPath, letterBytes);
    logger.log(`✅ Letter generated: ${path.basename(letterPath)}`);

    const destination = path.join(outputDir, sourceName);
    if (config.moveSource) {
      moveFile(sourcePath, destination);
      logger.log(`📦 Agreement moved to: ${folderName}`);
    } else {
      fs.copyFileSync(sourcePath, destination);
      logger.log(`📦 Agreement copied to: ${folderName}`);
    }
  } catch (error) {
    fs.rmSync(outputDir, { recursive: true, force: true });
    throw error;
  }

  return {
    status: "generated",
    record: {
      sourcePath,
      outputDir,
      letterPath,
      moved: config.moveSource,
      replacements,
      unresolvedTokens,
    },
  };
}

/**
 * Processes every agreement matching the configured pattern
 */
export async function processFiles(options: GenerateOptions = {}): Promise<GenerationResult> {
  const config = normalizeConfig(options);
  const { logger } = config;
  const result: GenerationResult = { generated: [], skipped: [], errors: [] };

  const validation = ConfigDetector.validateConfig(options);
  validation.warnings.forEach((warning) => logger.warn(`⚠️  ${warning}`));
  if (!validation.valid) {
    for (const message of validation.errors) {
      const configError = createGenerationError("CONFIG001", [message]);
      logError(configError, logger);
      result.errors.push(configError);
    }
    return result;
  }

  if (!fs.existsSync(config.templatePath)) {
    const templateError = createGenerationError("TEMPLATE001", [config.templatePath], {
      filePath: config.templatePath,
    });
    logError(templateError, logger);
    result.errors.push(templateError);
    return result;
  }

  const filePaths = (
    await glob(config.sourcePattern, {
      cwd: config.workDir,
      absolute: true,
      nocase: true,
      nodir: true,
    })
  ).sort();

  if (filePaths.length === 0) {
    logger.log(`ℹ️ No files matching "${config.sourcePattern}" in ${config.workDir}`);
    return result;
  }

  logger.log(`Found ${filePaths.length} agreement(s).`);
  const reader = createReader(config);

  for (const filePath of filePaths) {
    try {
      const outcome = await processSourceFile(filePath, config, reader);
      if (outcome.status === "generated") {
        result.generated.push(outcome.record);
      } else if (outcome.status === "skipped") {
        result.skipped.push(outcome.record);
      } else {
        logError(outcome.error, logger);
        result.errors.push(outcome.error);
      }
    } catch (error) {
      const fileError = enhanceError(
        error instanceof Error ? error : new Error(String(error)),
        filePath
      );
      logError(fileError, logger);
      logger.log("Moving on to the next file.");
      result.errors.push(fileError);
    }
    logger.log("");
  }

  return result;
}

/**
 * Runs processFiles and adds a user-facing summary of every error
 */
export async function executeLetterGeneration(options: GenerateOptions = {}): Promise<
  GenerationResult & {
    success: boolean;
    friendlyErrorMessage?: string;
  }
> {
  try {
    const result = await processFiles(options);

    if (result.errors.length > 0) {
      const errorMessages = result.errors.map((err) => formatErrorForUser(err));
      const friendlyErrorMessage = `${result.errors.length} error(s) during letter generation:\n\n${errorMessages.join(
        "\n\n---------------\n\n"
      )}`;

      return { ...result, success: false, friendlyErrorMessage };
    }

    return { ...result, success: true };
  } catch (error) {
    const topLevelError = enhanceError(
      error instanceof Error ? error : new Error(String(error))
    );

    return {
      generated: [],
      skipped: [],
      errors: [topLevelError],
      success: false,
      friendlyErrorMessage: formatErrorForUser(topLevelError),
    };
  }
}
