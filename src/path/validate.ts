import * as fs from "node:fs";
import * as path from "node:path";
import type { SymlinkMode } from "../config.js";
import {
  InvalidPathError,
  PathEscapesRootError,
  errnoCode,
  toIoError,
} from "../errors.js";
import { err, ok, type Result } from "../result.js";

// Same limit Linux applies to a single lookup (MAXSYMLINKS).
const MAX_SYMLINK_HOPS = 40;

/**
 * Joins `input` onto `root` and folds `.` and `..`. An absolute `input`
 * replaces `root` entirely; the containment check still applies to it.
 */
export function joinUnderRoot(root: string, input: string): string {
  return path.resolve(root, input);
}

export function normalizeLexical(candidate: string): string {
  return path.normalize(candidate);
}

/**
 * Boundary-safe prefix check: `/a/bc` and `/a/b-evil` are not inside `/a/b`.
 */
export function isWithinRoot(candidate: string, root: string): boolean {
  if (candidate === root) return true;
  const prefix = root.endsWith(path.sep) ? root : `${root}${path.sep}`;
  return candidate.startsWith(prefix);
}

/**
 * True when folding `..` segments of a relative input would step above its
 * starting directory at any point, even if later segments come back down.
 */
export function climbsAboveRoot(input: string): boolean {
  let depth = 0;
  for (const segment of input.split(/[\\/]+/)) {
    if (segment === "" || segment === ".") continue;
    depth += segment === ".." ? -1 : 1;
    if (depth < 0) return true;
  }
  return false;
}

function readLinkIfPresent(candidate: string): string | undefined {
  try {
    const stat = fs.lstatSync(candidate);
    return stat.isSymbolicLink() ? fs.readlinkSync(candidate) : undefined;
  } catch (error) {
    const code = errnoCode(error);
    if (code === "ENOENT" || code === "ENOTDIR") return undefined;
    throw error;
  }
}

function canonicalize(candidate: string, hops: number): string {
  try {
    return fs.realpathSync(candidate);
  } catch (error) {
    const code = errnoCode(error);
    if (code !== "ENOENT" && code !== "ENOTDIR") throw error;
  }

  const parent = path.dirname(candidate);
  if (parent === candidate) return candidate;
  const canonicalParent = canonicalize(parent, hops);

  // realpath reports ENOENT for a dangling symlink too; follow it so a write
  // through the link is judged by where it would land.
  const target = readLinkIfPresent(candidate);
  if (target !== undefined) {
    if (hops >= MAX_SYMLINK_HOPS) {
      throw Object.assign(new Error(`Too many levels of symbolic links: ${candidate}`), {
        code: "ELOOP",
      });
    }
    return canonicalize(path.resolve(canonicalParent, target), hops + 1);
  }

  return path.join(canonicalParent, path.basename(candidate));
}

/**
 * Resolves symlinks along the longest existing prefix of `candidate` and
 * appends the non-existent remainder lexically. Never fails just because the
 * final components do not exist yet.
 */
export function canonicalizeWeakly(candidate: string): string {
  return canonicalize(path.resolve(candidate), 0);
}

/**
 * Turns an untrusted relative path into an absolute path inside `root`.
 * `root` must already be in the form produced by the same `mode`.
 */
export function validatePath(
  root: string,
  input: string,
  mode: SymlinkMode,
): Result<string> {
  if (input.length === 0) {
    return err(new InvalidPathError("Empty path", { path: input }));
  }
  if (input.includes("\0")) {
    return err(new InvalidPathError("Path contains a NUL byte", { path: input }));
  }

  if (!path.isAbsolute(input) && climbsAboveRoot(input)) {
    return err(
      new PathEscapesRootError(`Path escapes root directory: ${input}`, { path: input }),
    );
  }

  const joined = joinUnderRoot(root, input);
  let normalized: string;
  if (mode === "lexical") {
    normalized = normalizeLexical(joined);
  } else {
    try {
      normalized = canonicalizeWeakly(joined);
    } catch (error) {
      return err(toIoError("Failed to resolve path", error, input));
    }
  }

  if (!isWithinRoot(normalized, root)) {
    return err(
      new PathEscapesRootError(`Path escapes root directory: ${input}`, { path: input }),
    );
  }
  return ok(normalized);
}
