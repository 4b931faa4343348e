import fs from "fs/promises";
import path from "path";
import { InvalidPathError, isErrnoException } from "../errors.js";

export interface CanonicalPath {
  /** Repository-relative, `/`-separated. */
  readonly relative: string;
  /** Absolute location beneath the resolved repository root. */
  readonly absolute: string;
}

const FORBIDDEN_TOKENS = ["~", "$", "`", "|", ";", "&", "<", ">", "\0", "\n", "\r"];

export function isGitMetadataPath(segments: string[]): boolean {
  return segments.some((seg) => seg.toLowerCase() === ".git");
}

/**
 * realpath() of the deepest existing ancestor with the missing tail appended,
 * so paths that do not exist yet still have their symlinked parents resolved.
 */
async function resolveExisting(target: string): Promise<string> {
  let current = target;
  const missing: string[] = [];
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return path.join(real, ...missing.reverse());
    } catch (e) {
      if (!isErrnoException(e) || (e.code !== "ENOENT" && e.code !== "ENOTDIR")) {
        throw e;
      }
      const parent = path.dirname(current);
      if (parent === current) return target;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function within(root: string, candidate: string) {
  const rel = path.relative(root, candidate);
  const escapes = rel === ".." || rel.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(rel);
}

export async function validatePath(
  repoRoot: string,
  rawPath: string,
): Promise<CanonicalPath> {
  if (typeof rawPath !== "string" || !rawPath.trim().length) {
    throw new InvalidPathError("Path cannot be empty", String(rawPath));
  }
  for (const token of FORBIDDEN_TOKENS) {
    if (rawPath.includes(token)) {
      throw new InvalidPathError("Path contains a forbidden character", rawPath);
    }
  }
  if (/^[\\/]/.test(rawPath) || /^[A-Za-z]:/.test(rawPath)) {
    throw new InvalidPathError("Absolute paths not allowed", rawPath);
  }

  const segments = rawPath.split(/[\\/]+/).filter((s) => s.length && s !== ".");
  if (segments.includes("..")) {
    throw new InvalidPathError("Parent-directory segments not allowed", rawPath);
  }
  if (!segments.length) {
    throw new InvalidPathError("Path cannot be empty", rawPath);
  }
  if (isGitMetadataPath(segments)) {
    throw new InvalidPathError("Path addresses repository metadata", rawPath);
  }

  let rootReal: string;
  let resolved: string;
  const absolute = (base: string) => path.join(base, ...segments);
  try {
    rootReal = await resolveExisting(path.resolve(repoRoot));
    resolved = await resolveExisting(absolute(rootReal));
  } catch {
    throw new InvalidPathError("Path could not be resolved", rawPath);
  }
  if (!within(rootReal, resolved)) {
    throw new InvalidPathError("Path outside repository boundaries", rawPath);
  }

  return { relative: segments.join("/"), absolute: absolute(rootReal) };
}

export type PathValidator = (rawPath: string) => Promise<CanonicalPath>;

export function createPathValidator(repoRoot: string): PathValidator {
  return (rawPath) => validatePath(repoRoot, rawPath);
}
