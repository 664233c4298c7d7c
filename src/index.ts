import { executeLetterGeneration, processFiles, processSourceFile } from "./processFiles";
import type { GenerateOptions } from "./types";

export type {
  GenerateOptions,
  GenerationResult,
  GeneratedLetterRecord,
  SkippedFileRecord,
  SkipReason,
  SourceDocumentReader,
  SourceDocumentText,
} from "./types";

export * from "./core";
export { ConfigDetector } from "./config/config-detector";
export { loadConfigFile } from "./config/config-loader";

export {
  DocxTemplate,
  loadDocxTemplate,
  readDocxTemplate,
  fillDocxTemplate,
} from "./adapters/docx-template";
export type { DocxDocument, DocxRunFormatting } from "./adapters/docx-template";
export { PdfSourceReader } from "./adapters/pdf-source-reader";

export {
  extractAgreementFields,
  findAmount,
  findCaseNumber,
  findLatestDate,
  findPurpose,
} from "./extraction/field-extractors";
export type { AgreementFields } from "./extraction/field-extractors";
export { buildPlaceholderMap, toLetterValues } from "./extraction/placeholder-builder";
export { DecimalAmount } from "./extraction/decimal-amount";
export { formatUkrainianDate } from "./extraction/calendar-date";
export type { CalendarDate } from "./extraction/calendar-date";

export { processFiles, processSourceFile, executeLetterGeneration };

/**
 * Generates letters for every agreement in `workDir`
 */
export async function generateLetters(options: GenerateOptions = {}) {
  return executeLetterGeneration(options);
}

export default generateLetters;
