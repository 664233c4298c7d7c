/**
 * Error handling
 * Structured error records with codes, templated messages and suggestions,
 * plus formatting for logs and for the end user.
 */

export enum ErrorCategory {
  CONFIG = "CONFIG",
  EXTRACTION = "EXTRACTION",
  TEMPLATE = "TEMPLATE",
  FILE_OPERATION = "FILE_OPERATION",
  UNKNOWN = "UNKNOWN",
}

export enum ErrorSeverity {
  WARNING = "WARNING", // reported, the file is skipped or processing continues
  ERROR = "ERROR", // the current file fails
  FATAL = "FATAL", // the whole batch stops
}

export interface GenerationError {
  code: string; // e.g. CONFIG001
  category: ErrorCategory;
  message: string;
  details?: string;
  filePath?: string;
  severity: ErrorSeverity;
  suggestion?: string;
  originalError?: Error;
}

interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

const errorDefinitions: Record<string, ErrorDefinition> = {
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "Invalid configuration: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "Check the {0} setting",
  },
  CONFIG002: {
    code: "CONFIG002",
    category: ErrorCategory.CONFIG,
    messageTemplate: "Configuration file not found or unreadable: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "Pass a path to a JSON file with generator options",
  },
  CONFIG003: {
    code: "CONFIG003",
    category: ErrorCategory.CONFIG,
    messageTemplate: "Placeholder values would be expanded again: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "A replacement value contains another placeholder; remove the marker from the value",
  },

  EXTRACT001: {
    code: "EXTRACT001",
    category: ErrorCategory.EXTRACTION,
    messageTemplate: "Required fields not found: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate:
      "Check that the agreement is a text PDF and that the fields appear where expected",
  },
  EXTRACT002: {
    code: "EXTRACT002",
    category: ErrorCategory.EXTRACTION,
    messageTemplate: "Cannot read source document: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Make sure the file is a valid, unencrypted PDF",
  },

  TEMPLATE001: {
    code: "TEMPLATE001",
    category: ErrorCategory.TEMPLATE,
    messageTemplate: "Template not found: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "Put the template next to the agreements or pass --template",
  },
  TEMPLATE002: {
    code: "TEMPLATE002",
    category: ErrorCategory.TEMPLATE,
    messageTemplate: "Template is not a valid DOCX file: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Re-save the template from Word as .docx",
  },
  TEMPLATE003: {
    code: "TEMPLATE003",
    category: ErrorCategory.TEMPLATE,
    messageTemplate: "Placeholders left unresolved: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "Rename the marker in the template or add it as an extra placeholder",
  },

  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to read file: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Check that the file exists and is readable",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to write file: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Check permissions and free space in the output directory",
  },
  FILE003: {
    code: "FILE003",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Output already exists: {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate: "Remove the existing output to generate it again",
  },

  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "Unexpected error: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Run again on this file alone to narrow the problem down",
  },
};

export function createGenerationError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    originalError?: Error;
  } = {}
): GenerationError {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate || "";

  params.forEach((param, index) => {
    message = message.replace(`{${index}}`, () => param);
    suggestion = suggestion.replace(`{${index}}`, () => param);
  });

  return {
    code: definition.code,
    category: definition.category,
    message,
    details: options.originalError?.message,
    filePath: options.filePath,
    severity: definition.severity,
    suggestion,
    originalError: options.originalError,
  };
}

export function formatError(error: GenerationError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\nFile: ${error.filePath}`;
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\nDetails: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\nSuggestion: ${error.suggestion}`;
  }

  return formattedMessage;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export function logError(error: GenerationError, logger: Logger = console): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    logger.warn(formattedError);
  } else {
    logger.error(formattedError);
  }
}

/**
 * Shorter form for the end-of-run summary
 */
export function formatErrorForUser(error: GenerationError): string {
  let message = `Error (${error.code}): ${error.message}`;

  if (error.filePath) {
    message += `\nFile: ${error.filePath}`;
  }

  if (error.suggestion) {
    message += `\n\nHow to fix:\n${error.suggestion}`;
  }

  return message;
}

/**
 * Maps a raw exception to the closest known error code
 */
export function enhanceError(error: Error, filePath?: string): GenerationError {
  const errorMessage = error.message;
  let errorCode = "GENERAL001";
  let params = [errorMessage];

  if (errorMessage.includes("ENOENT") || errorMessage.includes("no such file")) {
    errorCode = "FILE001";
    params = [filePath || errorMessage];
  } else if (
    errorMessage.includes("EACCES") ||
    errorMessage.includes("EPERM") ||
    errorMessage.includes("ENOSPC")
  ) {
    errorCode = "FILE002";
    params = [filePath || errorMessage];
  } else if (
    errorMessage.includes("Invalid PDF") ||
    errorMessage.includes("PasswordException") ||
    errorMessage.includes("No password given")
  ) {
    errorCode = "EXTRACT002";
    params = [filePath || errorMessage];
  } else if (
    errorMessage.includes("DOCX part") ||
    errorMessage.includes("End of data reached") ||
    errorMessage.includes("Corrupted zip") ||
    errorMessage.includes("central directory")
  ) {
    errorCode = "TEMPLATE002";
    params = [errorMessage];
  }

  return createGenerationError(errorCode, params, {
    filePath,
    originalError: error,
  });
}
