import fs from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import {
  ForbiddenError,
  IoError,
  NotFoundError,
  errorMessage,
  isErrnoException,
} from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import type { CanonicalPath } from "../paths/pathValidator.js";

export type MutationExecutorOptions = {
  safeMode: boolean;
  logger?: Logger;
};

export interface MutationExecutor {
  write(target: CanonicalPath, content: string | Buffer): Promise<void>;
  move(src: CanonicalPath, dst: CanonicalPath): Promise<void>;
  remove(target: CanonicalPath): Promise<void>;
}

async function pathExists(p: string) {
  try {
    await fs.lstat(p);
    return true;
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") return false;
    throw e;
  }
}

export function tempSiblingPath(finalPath: string) {
  return path.join(
    path.dirname(finalPath),
    `.${path.basename(finalPath)}.${randomUUID()}.tmp`,
  );
}

export function createMutationExecutor(
  options: MutationExecutorOptions,
): MutationExecutor {
  const log = options.logger ?? defaultLogger;

  async function write(target: CanonicalPath, content: string | Buffer) {
    const tmp = tempSiblingPath(target.absolute);
    try {
      await fs.mkdir(path.dirname(target.absolute), { recursive: true });
      await fs.writeFile(tmp, content);
      await fs.rename(tmp, target.absolute);
    } catch (e) {
      await fs.rm(tmp, { force: true }).catch((cleanupErr: unknown) => {
        log.warn("failed to remove temporary file", { tmp, error: cleanupErr });
      });
      log.error("file write failed", { path: target.relative, error: e });
      throw new IoError(`Failed to write ${target.relative}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    log.info("file written", { path: target.relative, bytes: content.length });
  }

  async function move(src: CanonicalPath, dst: CanonicalPath) {
    if (!(await pathExists(src.absolute))) {
      throw new NotFoundError("Source not found");
    }
    try {
      await fs.mkdir(path.dirname(dst.absolute), { recursive: true });
      try {
        await fs.rename(src.absolute, dst.absolute);
      } catch (e) {
        if (!isErrnoException(e) || e.code !== "EXDEV") throw e;
        await fs.cp(src.absolute, dst.absolute, { recursive: true });
        await fs.rm(src.absolute, { recursive: true, force: true });
      }
    } catch (e) {
      log.error("file move failed", { from: src.relative, to: dst.relative, error: e });
      throw new IoError(
        `Failed to move ${src.relative} to ${dst.relative}: ${errorMessage(e)}`,
        { cause: e },
      );
    }
    log.info("file moved", { from: src.relative, to: dst.relative });
  }

  async function remove(target: CanonicalPath) {
    if (options.safeMode) {
      throw new ForbiddenError("Deletion disabled (safe mode)");
    }
    if (!(await pathExists(target.absolute))) {
      throw new NotFoundError("File not found");
    }
    try {
      await fs.unlink(target.absolute);
    } catch (e) {
      log.error("file delete failed", { path: target.relative, error: e });
      throw new IoError(`Failed to delete ${target.relative}: ${errorMessage(e)}`, {
        cause: e,
      });
    }
    log.info("file deleted", { path: target.relative });
  }

  return { write, move, remove };
}
