export interface StoredFileInfo {
  path: string;
  size: number;
}

export interface RemoveFileResult {
  success: boolean;
  error?: string;
}

/**
 * Flat directory of uploaded media, addressed by stored filename.
 */
export interface IMediaFileStore {
  write(storedFilename: string, data: Buffer): Promise<StoredFileInfo>;
  /** Returns `null` when the file does not exist. */
  stat(storedFilename: string): Promise<StoredFileInfo | null>;
  /** Best effort; a missing file counts as success. Never throws. */
  remove(storedFilename: string): Promise<RemoveFileResult>;
  resolvePath(storedFilename: string): string;
}
