import { access, copyFile, mkdir, rename, rm, unlink } from "node:fs/promises";
import path from "node:path";
import type { CollisionPolicy, FileOutcomeStatus } from "@storyvault/types";
import { FileRoutingError } from "@storyvault/errors";
import { createSilentLogger, type Logger } from "@storyvault/logger";

export interface FileRouterOptions {
  successDir: string;
  failureDir: string;
  collisionPolicy: CollisionPolicy;
  logger?: Logger;
}

export interface IFileRouter {
  route(filePath: string, status: FileOutcomeStatus): Promise<string>;
}

function hasErrorCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return false;
    throw err;
  }
}

/**
 * Moves processed files out of intake into the success or failure directory.
 */
export class FileRouter implements IFileRouter {
  private readonly successDir: string;
  private readonly failureDir: string;
  private readonly collisionPolicy: CollisionPolicy;
  private readonly logger: Logger;

  constructor(options: FileRouterOptions) {
    this.successDir = options.successDir;
    this.failureDir = options.failureDir;
    this.collisionPolicy = options.collisionPolicy;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Create the destination directories, plus any extra ones (intake, database).
   */
  async ensureDirectories(extraDirs: string[] = []): Promise<void> {
    for (const dir of [...extraDirs, this.successDir, this.failureDir]) {
      await mkdir(dir, { recursive: true });
    }
  }

  /**
   * Move `filePath` by outcome and return where it landed.
   *
   * The `fail` policy guards the success directory only. A clash in the
   * failure directory is renamed, so a failed file never stays in intake.
   *
   * @throws FileRoutingError when the move fails or the `fail` policy meets an existing file
   */
  async route(filePath: string, status: FileOutcomeStatus): Promise<string> {
    const dir = status === "succeeded" ? this.successDir : this.failureDir;
    const policy =
      status === "failed" && this.collisionPolicy === "fail" ? "rename" : this.collisionPolicy;
    const destination = await this.resolveDestination(dir, path.basename(filePath), policy);

    try {
      await rename(filePath, destination);
    } catch (err) {
      if (!hasErrorCode(err, "EXDEV")) {
        throw new FileRoutingError(`Failed to move '${filePath}'`, destination, { cause: err });
      }
      // Different filesystem: copy then remove the original
      try {
        await copyFile(filePath, destination);
      } catch (copyErr) {
        throw new FileRoutingError(`Failed to move '${filePath}'`, destination, {
          cause: copyErr,
        });
      }
      try {
        await unlink(filePath);
      } catch (unlinkErr) {
        // The original stays in intake, so the copy must not survive
        await rm(destination, { force: true });
        throw new FileRoutingError(`Failed to move '${filePath}'`, destination, {
          cause: unlinkErr,
        });
      }
    }

    this.logger.debug({ from: filePath, to: destination, status }, "file routed");
    return destination;
  }

  private async resolveDestination(
    dir: string,
    fileName: string,
    policy: CollisionPolicy,
  ): Promise<string> {
    const target = path.join(dir, fileName);
    if (policy === "overwrite" || !(await exists(target))) {
      return target;
    }

    if (policy === "fail") {
      throw new FileRoutingError(`'${fileName}' already exists in '${dir}'`, target);
    }

    const { name, ext } = path.parse(fileName);
    for (let n = 1; ; n++) {
      const candidate = path.join(dir, `${name} (${String(n)})${ext}`);
      if (!(await exists(candidate))) {
        return candidate;
      }
    }
  }
}
