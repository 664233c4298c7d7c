/**
 * Configuration checks
 * Validates options without changing them and reports problems.
 */

import type { GenerateOptions } from "../types";
import { normalizeConfig } from "../core/config-normalizer";
import { PLACEHOLDER_KEYS } from "../extraction/placeholder-builder";

export class ConfigDetector {
  /**
   * Validates the options after normalization
   */
  static validateConfig(userOptions: GenerateOptions): {
    valid: boolean;
    errors: string[];
    warnings: string[];
  } {
    const errors: string[] = [];
    const warnings: string[] = [];

    try {
      const normalizedConfig = normalizeConfig(userOptions);

      try {
        new RegExp(normalizedConfig.placeholderPattern, "g");
      } catch (error) {
        errors.push(
          `placeholderPattern is not a valid regular expression: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
      }

      if (!(normalizedConfig.headerCropHeight > 0)) {
        errors.push("headerCropHeight must be a positive number");
      }

      if (!(normalizedConfig.xTolerance >= 0) || !(normalizedConfig.yTolerance >= 0)) {
        errors.push("xTolerance and yTolerance must not be negative");
      }

      if (!normalizedConfig.letterFileNameTemplate.toLowerCase().endsWith(".docx")) {
        warnings.push("letterFileNameTemplate does not end with .docx");
      }

      for (const [name, template] of [
        ["folderNameTemplate", normalizedConfig.folderNameTemplate],
        ["letterFileNameTemplate", normalizedConfig.letterFileNameTemplate],
      ] as const) {
        if (/[\\/]/.test(template)) {
          errors.push(`${name} must be a single path segment`);
        }
      }

      for (const key of Object.keys(normalizedConfig.extraPlaceholders)) {
        if (key.length === 0) {
          errors.push("extraPlaceholders contains an empty key");
        } else if (PLACEHOLDER_KEYS.includes(key)) {
          warnings.push(
            `extraPlaceholders key ${key} is already filled from the agreement and will be ignored`
          );
        }
      }
    } catch (error) {
      errors.push(
        `Configuration check failed: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * One-line summary plus the full validation result
   */
  static generateConfigReport(userOptions: GenerateOptions): {
    summary: string;
    details: ReturnType<typeof ConfigDetector.validateConfig>;
  } {
    const validation = ConfigDetector.validateConfig(userOptions);

    let summary = "Configuration check: ";
    if (validation.valid && validation.warnings.length === 0) {
      summary += "✅ no problems found";
    } else {
      summary += `⚠️ ${validation.errors.length} error(s), ${validation.warnings.length} warning(s)`;
    }

    return { summary, details: validation };
  }

  static quickCheck(userOptions: GenerateOptions): {
    hasErrors: boolean;
    criticalErrors: string[];
  } {
    const validation = ConfigDetector.validateConfig(userOptions);

    return {
      hasErrors: validation.errors.length > 0,
      criticalErrors: validation.errors,
    };
  }
}
