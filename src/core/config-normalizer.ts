/**
 * Configuration normalization
 * Every default lives in CONFIG_DEFAULTS; normalizeConfig resolves user options
 * into a record with no undefined values.
 */

import path from "path";
import type { Logger } from "./error-handler";
import type { GenerateOptions, SourceDocumentReader } from "../types";
import { DEFAULT_PLACEHOLDER_PATTERN } from "./tree-walker";

export const CONFIG_DEFAULTS = {
  SOURCE_PATTERN: "Grant Agreement*.pdf",
  TEMPLATE_FILE_NAME: "Письмо на Банк шаблон.docx",
  FOLDER_NAME_TEMPLATE:
    "{{YY_MM}} Нова ХХХ {{FULL_AMOUNT_DEC}} №{{CASE_NUM}} Хелп",
  LETTER_FILE_NAME_TEMPLATE: "Письмо_в_банк_№{{CASE_NUM}}.docx",

  // pdf text layout, in points
  HEADER_CROP_HEIGHT: 100,
  X_TOLERANCE: 1,
  Y_TOLERANCE: 3,

  MOVE_SOURCE: true,
  PLACEHOLDER_PATTERN: DEFAULT_PLACEHOLDER_PATTERN,
} as const;

export interface NormalizedGenerateOptions {
  workDir: string;
  sourcePattern: string;
  templatePath: string;
  outputDir: string | null;
  folderNameTemplate: string;
  letterFileNameTemplate: string;
  headerCropHeight: number;
  xTolerance: number;
  yTolerance: number;
  moveSource: boolean;
  placeholderPattern: string;
  extraPlaceholders: Record<string, string>;
  logger: Logger;

  // kept as given; the orchestration builds the pdf reader from the layout
  // settings above when none is supplied
  reader?: SourceDocumentReader;
}

export function normalizeConfig(
  options: GenerateOptions = {},
  cwd: string = process.cwd()
): NormalizedGenerateOptions {
  const workDir = path.resolve(cwd, options.workDir ?? ".");

  return {
    workDir,
    sourcePattern: options.sourcePattern || CONFIG_DEFAULTS.SOURCE_PATTERN,
    templatePath: path.resolve(
      workDir,
      options.templatePath || CONFIG_DEFAULTS.TEMPLATE_FILE_NAME
    ),
    outputDir: options.outputDir ? path.resolve(workDir, options.outputDir) : null,
    folderNameTemplate:
      options.folderNameTemplate || CONFIG_DEFAULTS.FOLDER_NAME_TEMPLATE,
    letterFileNameTemplate:
      options.letterFileNameTemplate || CONFIG_DEFAULTS.LETTER_FILE_NAME_TEMPLATE,
    headerCropHeight: options.headerCropHeight ?? CONFIG_DEFAULTS.HEADER_CROP_HEIGHT,
    xTolerance: options.xTolerance ?? CONFIG_DEFAULTS.X_TOLERANCE,
    yTolerance: options.yTolerance ?? CONFIG_DEFAULTS.Y_TOLERANCE,
    moveSource: options.moveSource ?? CONFIG_DEFAULTS.MOVE_SOURCE,
    placeholderPattern:
      options.placeholderPattern || CONFIG_DEFAULTS.PLACEHOLDER_PATTERN,
    extraPlaceholders: { ...options.extraPlaceholders },
    logger: options.logger ?? console,
    reader: options.reader,
  };
}
