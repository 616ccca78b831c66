export const UNKNOWN_FILE_TYPE = "unknown";

export interface FileTypeOptions {
  /** Longer extensions are treated as unknown. */
  maxExtensionLength?: number;
}

/**
 * Lower-cased extension after the last dot of the file name.
 */
export function extractFileType(fileName: string | null | undefined, options: FileTypeOptions = {}): string {
  if (!fileName) {
    return UNKNOWN_FILE_TYPE;
  }
  const dotIndex = fileName.lastIndexOf(".");
  if (dotIndex === -1) {
    return UNKNOWN_FILE_TYPE;
  }
  const extension = fileName.slice(dotIndex + 1).trim().toLowerCase();
  if (extension.length === 0) {
    return UNKNOWN_FILE_TYPE;
  }
  if (options.maxExtensionLength !== undefined && extension.length > options.maxExtensionLength) {
    return UNKNOWN_FILE_TYPE;
  }
  return extension;
}
