/**
 * Reads generator options from a JSON file
 */

import fs from "fs";
import path from "path";
import type { GenerateOptions } from "../types";
import type { GenerationError } from "../core/error-handler";
import { createGenerationError } from "../core/error-handler";

type FileOptions = Omit<GenerateOptions, "reader" | "logger">;

const STRING_KEYS = [
  "workDir",
  "sourcePattern",
  "templatePath",
  "outputDir",
  "folderNameTemplate",
  "letterFileNameTemplate",
  "placeholderPattern",
] as const;

const NUMBER_KEYS = ["headerCropHeight", "xTolerance", "yTolerance"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Picks the known options out of parsed JSON. Throws on a value of the wrong type.
 */
export function parseConfigObject(raw: unknown): FileOptions {
  if (!isRecord(raw)) {
    throw new Error("the configuration must be a JSON object");
  }

  const options: FileOptions = {};

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new Error(`${key} must be a string`);
    }
    options[key] = value;
  }

  for (const key of NUMBER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "number" || Number.isNaN(value)) {
      throw new Error(`${key} must be a number`);
    }
    options[key] = value;
  }

  const moveSource = raw.moveSource;
  if (moveSource !== undefined) {
    if (typeof moveSource !== "boolean") {
      throw new Error("moveSource must be a boolean");
    }
    options.moveSource = moveSource;
  }

  if (raw.extraPlaceholders !== undefined) {
    const extra = raw.extraPlaceholders;
    if (!isRecord(extra)) {
      throw new Error("extraPlaceholders must be an object of strings");
    }
    const placeholders: Record<string, string> = {};
    for (const [key, value] of Object.entries(extra)) {
      if (typeof value !== "string") {
        throw new Error(`extraPlaceholders.${key} must be a string`);
      }
      placeholders[key] = value;
    }
    options.extraPlaceholders = placeholders;
  }

  return options;
}

/**
 * Loads a JSON options file. A relative workDir inside the file is resolved
 * against the file's own directory.
 */
export function loadConfigFile(filePath: string): {
  options?: FileOptions;
  error?: GenerationError;
} {
  if (!fs.existsSync(filePath)) {
    return { error: createGenerationError("CONFIG002", [filePath], { filePath }) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    return {
      error: createGenerationError("CONFIG002", [filePath], {
        filePath,
        originalError: e instanceof Error ? e : new Error(String(e)),
      }),
    };
  }

  try {
    const options = parseConfigObject(raw);
    if (options.workDir) {
      options.workDir = path.resolve(path.dirname(filePath), options.workDir);
    }
    return { options };
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { error: createGenerationError("CONFIG001", [message], { filePath }) };
  }
}
