import type { GenerationError, Logger } from "./core/error-handler";

/**
 * Text pulled from the agreement, page by page
 */
export interface SourceDocumentText {
  firstPageText: string;
  /** Text in the top band of the first page, where the case number sits */
  firstPageHeaderText: string;
  lastPageText: string;
  /** All pages joined with "\n" */
  fullText: string;
}

export interface SourceDocumentReader {
  read(filePath: string): Promise<SourceDocumentText>;
}

/**
 * Options for a generation run.
 */
export interface GenerateOptions {
  /**
   * Directory searched for agreements. Default is the current directory.
   */
  workDir?: string;

  /**
   * Glob for agreement files, matched case-insensitively inside workDir.
   * Default is "Grant Agreement*.pdf".
   */
  sourcePattern?: string;

  /**
   * Letter template. A relative path is resolved against workDir.
   * Default is "Письмо на Банк шаблон.docx".
   */
  templatePath?: string;

  /**
   * Where output folders are created. By default each folder is created next
   * to its agreement.
   */
  outputDir?: string;

  /**
   * Folder name, rendered with the placeholder map.
   */
  folderNameTemplate?: string;

  /**
   * Letter file name, rendered with the placeholder map.
   */
  letterFileNameTemplate?: string;

  /**
   * Height in points of the band at the top of page 1 searched for the case
   * number. Default is 100.
   */
  headerCropHeight?: number;

  /**
   * Gap in points above which two text items on a line are separated by a
   * space. Default is 1.
   */
  xTolerance?: number;

  /**
   * Vertical distance in points within which text items share a line.
   * Default is 3.
   */
  yTolerance?: number;

  /**
   * Move the agreement into its output folder (true) or copy it (false).
   * Default is true.
   */
  moveSource?: boolean;

  /**
   * Regular expression used to spot placeholders the map did not resolve.
   * Default is "\{\{[^{}]+\}\}".
   */
  placeholderPattern?: string;

  /**
   * Fixed placeholders appended after the extracted ones.
   */
  extraPlaceholders?: Record<string, string>;

  /**
   * Replaces the PDF reader, mainly for tests.
   */
  reader?: SourceDocumentReader;

  /**
   * Receives progress output. Default is console.
   */
  logger?: Logger;
}

export type SkipReason = "missing-fields" | "output-folder-exists";

export interface GeneratedLetterRecord {
  sourcePath: string;
  outputDir: string;
  letterPath: string;
  /** True when the agreement was moved, false when it was copied */
  moved: boolean;
  replacements: number;
  unresolvedTokens: string[];
}

export interface SkippedFileRecord {
  sourcePath: string;
  reason: SkipReason;
  detail?: string;
}

export interface GenerationResult {
  generated: GeneratedLetterRecord[];
  skipped: SkippedFileRecord[];
  errors: GenerationError[];
}
