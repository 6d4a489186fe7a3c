import * as path from "node:path";
import { Logger, type ILogObj } from "tslog";
import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

export const symlinkModeSchema = z.enum(["resolve", "lexical"]);

/**
 * `resolve` canonicalizes the existing part of every candidate path, so a
 * symlink inside root that points outside it is rejected. `lexical` only folds
 * `.` and `..` and does not detect such symlinks.
 */
export type SymlinkMode = z.infer<typeof symlinkModeSchema>;

export const sandboxOptionsSchema = z.object({
  root: z
    .string()
    .min(1, "root must not be empty")
    .refine((value) => !value.includes("\0"), "root must not contain NUL bytes")
    .refine((value) => path.isAbsolute(value), "root must be an absolute path"),
  symlinks: symlinkModeSchema.default("resolve"),
  logger: z
    .custom<Logger<ILogObj>>((value) => value instanceof Logger, "logger must be a tslog Logger")
    .optional(),
});

export type SandboxOptions = z.input<typeof sandboxOptionsSchema>;
export type ResolvedSandboxOptions = z.output<typeof sandboxOptionsSchema>;

export function parseSandboxOptions(options: SandboxOptions | string): ResolvedSandboxOptions {
  const input = typeof options === "string" ? { root: options } : options;
  const parsed = sandboxOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new InvalidArgumentError(`Invalid sandbox options: ${detail}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export const timestampSchema = z.number().int().safe();
