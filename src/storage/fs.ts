import * as fs from "node:fs";
import * as path from "node:path";
import type { ILogObj, Logger } from "tslog";
import {
  parseSandboxOptions,
  timestampSchema,
  type SandboxOptions,
  type SymlinkMode,
} from "../config.js";
import {
  InvalidArgumentError,
  NotADirectoryError,
  SandboxIoError,
  errnoCode,
  toIoError,
  type SandboxError,
} from "../errors.js";
import { defaultLogger } from "../logging/logger.js";
import { canonicalizeWeakly, validatePath } from "../path/validate.js";
import { err, ok, type Result } from "../result.js";
import type { FileStats, SandboxedStorage, Timestamp } from "./storage.js";

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

function toBytes(content: Uint8Array | string, encoding: BufferEncoding): Uint8Array {
  return typeof content === "string" ? Buffer.from(content, encoding) : content;
}

/**
 * Synchronous filesystem access confined to one root directory.
 *
 * The root is fixed at construction. Every operation validates its path
 * first and only then touches the disk; nothing is cached between calls.
 */
export class FileSystemSandbox implements SandboxedStorage {
  /** The root as configured. */
  readonly root: string;
  /** The root in the form containment is checked against. */
  readonly canonicalRoot: string;
  readonly symlinks: SymlinkMode;
  private readonly logger: Logger<ILogObj>;

  constructor(options: SandboxOptions | string) {
    const resolved = parseSandboxOptions(options);
    this.root = resolved.root;
    this.symlinks = resolved.symlinks;
    this.logger = resolved.logger ?? defaultLogger;

    if (this.symlinks === "lexical") {
      this.canonicalRoot = path.resolve(this.root);
    } else {
      try {
        this.canonicalRoot = canonicalizeWeakly(this.root);
      } catch (error) {
        throw toIoError("Failed to resolve root", error);
      }
    }
    this.logger.debug("Sandbox created", {
      root: this.canonicalRoot,
      symlinks: this.symlinks,
    });
  }

  private resolve(filePath: string): Result<string> {
    const result = validatePath(this.canonicalRoot, filePath, this.symlinks);
    if (!result.ok) {
      this.logger.warn("Rejected path", {
        kind: result.error.kind,
        path: filePath,
      });
    }
    return result;
  }

  private fail<T>(error: SandboxError): Result<T> {
    this.logger.debug(error.message, { kind: error.kind, path: error.path });
    return err(error);
  }

  private toRelative(absolutePath: string): string {
    return path.relative(this.canonicalRoot, absolutePath).split(path.sep).join("/");
  }

  exists(filePath: string): boolean {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return false;
    return fs.existsSync(resolved.value);
  }

  read(filePath: string): Result<Buffer> {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return resolved;

    let fd: number;
    try {
      fd = fs.openSync(resolved.value, "r");
    } catch (error) {
      return this.fail(toIoError(`Failed to open file "${filePath}"`, error, filePath));
    }

    try {
      const stat = fs.fstatSync(fd);
      if (stat.isDirectory()) {
        return this.fail(
          new SandboxIoError(`Failed to read file "${filePath}": is a directory`, {
            path: filePath,
            code: "EISDIR",
          }),
        );
      }
      const size = stat.size;
      const content = Buffer.alloc(size);
      let offset = 0;
      while (offset < size) {
        const bytesRead = fs.readSync(fd, content, offset, size - offset, offset);
        if (bytesRead === 0) break;
        offset += bytesRead;
      }
      if (offset !== size) {
        return this.fail(
          new SandboxIoError(
            `Failed to read file "${filePath}": short read (${offset} of ${size} bytes)`,
            { path: filePath },
          ),
        );
      }
      return ok(content);
    } catch (error) {
      return this.fail(toIoError(`Failed to read file "${filePath}"`, error, filePath));
    } finally {
      fs.closeSync(fd);
    }
  }

  /** Decodes without validating; callers own the encoding. */
  readString(filePath: string, encoding: BufferEncoding = "utf-8"): Result<string> {
    const bytes = this.read(filePath);
    if (!bytes.ok) return bytes;
    return ok(bytes.value.toString(encoding));
  }

  write(
    filePath: string,
    content: Uint8Array | string,
    encoding: BufferEncoding = "utf-8",
  ): Result<void> {
    return this.writeBytes(filePath, toBytes(content, encoding), "w");
  }

  append(
    filePath: string,
    content: Uint8Array | string,
    encoding: BufferEncoding = "utf-8",
  ): Result<void> {
    return this.writeBytes(filePath, toBytes(content, encoding), "a");
  }

  private writeBytes(filePath: string, bytes: Uint8Array, flags: "w" | "a"): Result<void> {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return resolved;
    const full = resolved.value;

    try {
      fs.mkdirSync(path.dirname(full), { recursive: true });
    } catch (error) {
      return this.fail(toIoError("Failed to create directories", error, filePath));
    }

    let fd: number;
    try {
      fd = fs.openSync(full, flags);
    } catch (error) {
      return this.fail(
        toIoError(`Failed to open file for writing "${filePath}"`, error, filePath),
      );
    }

    try {
      let offset = 0;
      while (offset < bytes.length) {
        offset += fs.writeSync(fd, bytes, offset, bytes.length - offset);
      }
      return ok(undefined);
    } catch (error) {
      return this.fail(toIoError(`Failed to write file "${filePath}"`, error, filePath));
    } finally {
      fs.closeSync(fd);
    }
  }

  /** Removes a file, symlink or empty directory. Absent entries are not an error. */
  remove(filePath: string): Result<void> {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return resolved;

    try {
      const stat = fs.lstatSync(resolved.value);
      if (stat.isDirectory()) {
        fs.rmdirSync(resolved.value);
      } else {
        fs.unlinkSync(resolved.value);
      }
      return ok(undefined);
    } catch (error) {
      if (isMissing(error)) return ok(undefined);
      return this.fail(toIoError(`Failed to remove "${filePath}"`, error, filePath));
    }
  }

  size(filePath: string): Result<number> {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return resolved;

    try {
      const stat = fs.statSync(resolved.value);
      if (stat.isDirectory()) {
        return this.fail(
          new SandboxIoError(`Failed to get file size "${filePath}": is a directory`, {
            path: filePath,
            code: "EISDIR",
          }),
        );
      }
      return ok(stat.size);
    } catch (error) {
      return this.fail(toIoError(`Failed to get file size "${filePath}"`, error, filePath));
    }
  }

  mtime(filePath: string): Result<Timestamp> {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return resolved;

    try {
      return ok(Math.trunc(fs.statSync(resolved.value).mtimeMs));
    } catch (error) {
      return this.fail(toIoError(`Failed to get mtime "${filePath}"`, error, filePath));
    }
  }

  /** Sets the modification time and leaves the access time as it was. */
  setMtime(filePath: string, time: Timestamp): Result<void> {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return resolved;

    const parsed = timestampSchema.safeParse(time);
    if (!parsed.success) {
      return this.fail(
        new InvalidArgumentError(`Invalid timestamp: ${time}`, { cause: parsed.error }),
      );
    }

    try {
      const { atime } = fs.statSync(resolved.value);
      fs.utimesSync(resolved.value, atime, new Date(parsed.data));
      return ok(undefined);
    } catch (error) {
      return this.fail(toIoError(`Failed to set mtime "${filePath}"`, error, filePath));
    }
  }

  stat(filePath: string): Result<FileStats> {
    const resolved = this.resolve(filePath);
    if (!resolved.ok) return resolved;

    try {
      const s = fs.statSync(resolved.value);
      return ok({
        size: s.size,
        modifiedAt: s.mtime,
        createdAt: s.birthtime,
        isDirectory: s.isDirectory(),
      });
    } catch (error) {
      return this.fail(toIoError(`Failed to stat "${filePath}"`, error, filePath));
    }
  }

  /**
   * Resolves a listing target. `undefined` means the directory does not
   * exist, which callers report as an empty listing.
   */
  private resolveDirectory(dir: string): Result<string | undefined> {
    let target: string;
    if (dir === "") {
      target = this.canonicalRoot;
    } else {
      const resolved = this.resolve(dir);
      if (!resolved.ok) return resolved;
      target = resolved.value;
    }

    let stat: fs.Stats | undefined;
    try {
      stat = fs.statSync(target, { throwIfNoEntry: false });
    } catch (error) {
      if (isMissing(error)) return ok(undefined);
      return this.fail(toIoError(`Failed to list directory "${dir}"`, error, dir));
    }
    if (stat === undefined) return ok(undefined);
    if (!stat.isDirectory()) {
      return this.fail(new NotADirectoryError(`Not a directory: ${dir}`, { path: dir }));
    }
    return ok(target);
  }

  /** Immediate children of `dir` as root-relative paths, sorted. */
  list(dir = ""): Result<string[]> {
    const target = this.resolveDirectory(dir);
    if (!target.ok) return target;
    if (target.value === undefined) return ok([]);
    const directory = target.value;

    try {
      return ok(
        fs
          .readdirSync(directory)
          .map((name) => this.toRelative(path.join(directory, name)))
          .sort(),
      );
    } catch (error) {
      return this.fail(toIoError(`Failed to list directory "${dir}"`, error, dir));
    }
  }

  /**
   * Every regular file below `dir` as a root-relative path, sorted.
   * Directories are not reported and symlinked directories are not entered.
   */
  listRecursive(dir = ""): Result<string[]> {
    const target = this.resolveDirectory(dir);
    if (!target.ok) return target;
    if (target.value === undefined) return ok([]);

    const files: string[] = [];
    try {
      this.collectFiles(target.value, files);
    } catch (error) {
      return this.fail(toIoError(`Failed to list directory "${dir}"`, error, dir));
    }
    return ok(files.sort());
  }

  private collectFiles(directory: string, out: string[]): void {
    for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
      const full = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        this.collectFiles(full, out);
      } else if (entry.isFile()) {
        out.push(this.toRelative(full));
      } else if (entry.isSymbolicLink()) {
        const target = fs.statSync(full, { throwIfNoEntry: false });
        if (target?.isFile()) out.push(this.toRelative(full));
      }
    }
  }

  /** Creates the directory and its missing ancestors. Existing directories are fine. */
  mkdir(dirPath: string): Result<void> {
    const resolved = this.resolve(dirPath);
    if (!resolved.ok) return resolved;

    try {
      fs.mkdirSync(resolved.value, { recursive: true });
      return ok(undefined);
    } catch (error) {
      return this.fail(toIoError(`Failed to create directory "${dirPath}"`, error, dirPath));
    }
  }

  /**
   * Where `filePath` would point under the root, computed without validation
   * or normalization. Not a security check: never use the result for I/O on
   * untrusted input.
   */
  absolute(filePath: string): string {
    if (filePath === "") return this.root;
    if (path.isAbsolute(filePath)) return filePath;
    return this.root.endsWith(path.sep)
      ? `${this.root}${filePath}`
      : `${this.root}${path.sep}${filePath}`;
  }
}
