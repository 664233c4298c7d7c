/**
 * Core module index
 * The substitution engine and the shared configuration and error handling.
 */

export * from "./document-model";
export {
  createTokenMap,
  extendTokenMap,
  findSelfReferencingTokens,
} from "./token-map";
export type { TokenMap, TokenMapSource } from "./token-map";
export {
  locateToken,
  renderTokens,
  replaceInParagraph,
  replaceOnce,
} from "./run-span-replacer";
export type { TokenMatch } from "./run-span-replacer";
export {
  DEFAULT_PLACEHOLDER_PATTERN,
  findUnresolvedTokens,
  replaceAll,
} from "./tree-walker";

export { normalizeConfig, CONFIG_DEFAULTS } from "./config-normalizer";
export type { NormalizedGenerateOptions } from "./config-normalizer";

export {
  createGenerationError,
  enhanceError,
  formatError,
  formatErrorForUser,
  logError,
  ErrorCategory,
  ErrorSeverity,
} from "./error-handler";
export type { GenerationError, Logger } from "./error-handler";
