import type { Result } from "../result.js";

/** Integer milliseconds since the Unix epoch. */
export type Timestamp = number;

export interface FileStats {
  size: number;
  modifiedAt: Date;
  createdAt: Date;
  isDirectory: boolean;
}

/**
 * Filesystem operations addressed by paths relative to a fixed root. Every
 * path is validated to stay inside the root before any I/O happens.
 */
export interface SandboxedStorage {
  readonly root: string;
  exists(path: string): boolean;
  read(path: string): Result<Buffer>;
  readString(path: string, encoding?: BufferEncoding): Result<string>;
  write(path: string, content: Uint8Array | string, encoding?: BufferEncoding): Result<void>;
  append(path: string, content: Uint8Array | string, encoding?: BufferEncoding): Result<void>;
  remove(path: string): Result<void>;
  size(path: string): Result<number>;
  mtime(path: string): Result<Timestamp>;
  setMtime(path: string, time: Timestamp): Result<void>;
  stat(path: string): Result<FileStats>;
  list(dir?: string): Result<string[]>;
  listRecursive(dir?: string): Result<string[]>;
  mkdir(path: string): Result<void>;
  absolute(path: string): string;
}
