/**
 * Client-side file validation. Pure: no I/O, a failure excludes only the
 * file it concerns.
 */

import { formatSize, UploadLimits } from "../../engine/limits/uploadLimits";
import { substitute } from "../../engine/i18n/translator";
import { Logger, silentLogger } from "../../engine/observability/logger";
import { UploadFile, ValidationResult } from "./uploadTypes";

export const DEFAULT_SIZE_MARGIN = 1.1;

const FILE_NAME_PATTERN = /^[\w\-. ]+$/;

export const DEFAULT_MESSAGES = {
  invalid_file_extension: "The extension :extension is not allowed. Allowed extensions: :extensions.",
  invalid_mime_type: "The file type :type is not allowed. Allowed types: :mimetypes.",
  max_file_size: "The file exceeds the maximum size of :size.",
  invalid_file_name: "The file name :filename contains characters that are not allowed.",
  too_many_files: "You selected :count files. The maximum is :limit.",
  file_too_large: "The file :name (:size) exceeds the per-file limit of :limit.",
  total_too_large: "The selected files (:size) exceed the total limit of :limit.",
} as const;

export type ValidationMessageKey = keyof typeof DEFAULT_MESSAGES;

export interface FileValidatorOptions {
  allowedExtensions: string[];
  allowedMimeTypes: string[];
  /** Per-file ceiling in bytes */
  maxSize: number;
  /** Server-provided translations; missing keys fall back to English */
  translations?: Record<string, string>;
  logger?: Logger;
}

export function getExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot === -1 ? "" : fileName.slice(dot + 1).toLowerCase();
}

/**
 * True when the name holds only word characters, dashes, dots and spaces.
 */
export function validateFileName(name: string): boolean {
  return FILE_NAME_PATTERN.test(name);
}

export class FileValidator {
  private readonly allowedExtensions: string[];
  private readonly allowedMimeTypes: string[];
  private readonly maxSize: number;
  private readonly translations: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: FileValidatorOptions) {
    this.allowedExtensions = options.allowedExtensions.map((extension) => extension.toLowerCase());
    this.allowedMimeTypes = options.allowedMimeTypes;
    this.maxSize = options.maxSize;
    this.translations = options.translations ?? {};
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Checks extension, MIME type, size, then name. First failure wins.
   */
  validate(file: UploadFile): ValidationResult {
    const extension = getExtension(file.name);
    if (!this.allowedExtensions.includes(extension)) {
      return this.fail("invalid_file_extension", {
        extension,
        extensions: this.allowedExtensions.join(", "),
      });
    }

    if (!this.allowedMimeTypes.includes(file.type)) {
      return this.fail("invalid_mime_type", {
        type: file.type,
        mimetypes: this.allowedMimeTypes.join(", "),
      });
    }

    if (file.size > this.maxSize) {
      return this.fail("max_file_size", { size: formatSize(this.maxSize) });
    }

    if (!validateFileName(file.name)) {
      return this.fail("invalid_file_name", { filename: file.name });
    }

    return { isValid: true };
  }

  /**
   * Batch checks against negotiated limits: count, then each file, then the
   * margin-adjusted total.
   */
  validateAgainstLimits(files: UploadFile[], limits: UploadLimits | null | undefined): ValidationResult {
    if (!limits) {
      this.logger.warning("Upload limits unavailable, skipping batch validation");
      return { isValid: true };
    }

    if (files.length > limits.max_files) {
      return this.fail("too_many_files", { count: files.length, limit: limits.max_files });
    }

    for (const file of files) {
      if (file.size > limits.max_file_size) {
        return this.fail("file_too_large", {
          name: file.name,
          size: formatSize(file.size),
          limit: limits.max_file_size_formatted,
        });
      }
    }

    const margin = limits.size_margin ?? DEFAULT_SIZE_MARGIN;
    const total = files.reduce((sum, file) => sum + file.size, 0);
    const withMargin = Math.round(total * margin);

    if (withMargin > limits.max_total_size) {
      return this.fail("total_too_large", {
        size: formatSize(withMargin),
        limit: limits.max_total_size_formatted,
      });
    }

    return { isValid: true };
  }

  message(key: ValidationMessageKey, replace: Record<string, string | number>): string {
    return substitute(this.translations[key] ?? DEFAULT_MESSAGES[key], replace);
  }

  private fail(key: ValidationMessageKey, replace: Record<string, string | number>): ValidationResult {
    const message = this.message(key, replace);
    this.logger.debug("File validation failed", { rule: key, message });
    return { isValid: false, message };
  }
}
