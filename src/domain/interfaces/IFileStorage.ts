/**
 * Flat-file storage rooted at one directory
 */
export interface IFileStorage {
  /**
   * Write a stream to `path` (relative to the root) and return the absolute path
   */
  save(path: string, data: NodeJS.ReadableStream, options?: SaveOptions): Promise<SavedFile>;

  exists(path: string): Promise<boolean>;

  delete(path: string): Promise<void>;

  /**
   * Create a directory (and parents) below the root
   */
  createDirectory(path: string): Promise<void>;

  /**
   * Absolute path for a path below the root
   */
  resolve(path: string): string;
}

export interface SaveOptions {
  overwrite?: boolean;
  createDirectories?: boolean;
  /** Called after every chunk is written */
  progressCallback?: (progress: SaveProgress) => void;
}

export interface SaveProgress {
  savedBytes: number;
}

export interface SavedFile {
  path: string;
  size: number;
}
