import 'reflect-metadata';
import { injectable, singleton, inject } from 'tsyringe';
import { constants, copyFile, link, lstat, mkdir, rename, rm, unlink } from 'fs/promises';
import { basename, dirname, extname, join, resolve } from 'path';
import { randomBytes } from 'crypto';
import { ConfigService } from './config.service';
import { Logger } from './logger.service';
import type { ILogger } from './logger.service';
import {
  DirectoryCreationError,
  MoveExecutionError,
  NameResolutionError,
  describeError,
  errorCode
} from '../utils/errors';
import type { MoveError } from '../utils/errors';

export interface MoveSuccess {
  success: true
  source: string
  destination: string
}

export interface MoveFailure {
  success: false
  source: string
  error: MoveError
}

export type MoveResult = MoveSuccess | MoveFailure

interface Candidate {
  path: string
  counter: number
}

// link() errors meaning "this filesystem cannot hard link", not "this move failed"
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'ENOSYS', 'EMLINK']);

/**
 * Moves a file into a directory without ever replacing an existing entry.
 *
 * The first free name among `name.ext`, `name_1.ext`, `name_2.ext`, ... is
 * chosen. Placement goes through a hard link, which fails instead of
 * overwriting when another mover claimed the same name first; resolution then
 * resumes at the next counter. Filesystems without hard links fall back to a
 * plain rename, where a concurrent mover can still win the name between the
 * existence check and the rename.
 */
@singleton()
@injectable()
export class FileMoverService {
  constructor (
    @inject(ConfigService) private readonly configService: ConfigService,
    @inject(Logger) private readonly logger: ILogger
  ) {}

  async move (source: string, destinationDir: string): Promise<MoveResult> {
    const absSource = resolve(source);
    const absDir = resolve(destinationDir);

    try {
      await mkdir(absDir, { recursive: true });
    } catch (error) {
      return this.fail(absSource, new DirectoryCreationError(absDir, error));
    }

    const maxAttempts = this.configService.getConfig().maxNameAttempts;
    let nextCounter = 0;

    for (;;) {
      let candidate: Candidate | null;
      try {
        candidate = await this.resolveDestination(absSource, absDir, nextCounter, maxAttempts);
      } catch (error) {
        return this.fail(absSource, new MoveExecutionError(absSource, absDir, error));
      }

      if (!candidate) {
        return this.fail(absSource, new NameResolutionError(absSource, maxAttempts));
      }

      try {
        if (await this.place(absSource, candidate.path)) {
          this.logger.debug(`Moved: ${basename(absSource)} -> ${candidate.path}`);
          return { success: true, source: absSource, destination: candidate.path };
        }
      } catch (error) {
        return this.fail(absSource, new MoveExecutionError(absSource, candidate.path, error));
      }

      this.logger.debug(`Destination ${candidate.path} was taken concurrently, retrying`);
      nextCounter = candidate.counter + 1;
    }
  }

  /**
   * First unused name in `destinationDir`, scanning counters from `fromCounter`
   * (0 stands for the bare file name). Null once `maxAttempts` is exceeded.
   */
  async resolveDestination (
    source: string,
    destinationDir: string,
    fromCounter: number = 0,
    maxAttempts: number = Number.POSITIVE_INFINITY
  ): Promise<Candidate | null> {
    const fileName = basename(source);

    if (fromCounter === 0) {
      const bare = join(destinationDir, fileName);
      if (!await this.exists(bare)) {
        return { path: bare, counter: 0 };
      }
    }

    const extension = extname(fileName);
    const stem = basename(fileName, extension);

    for (let counter = Math.max(fromCounter, 1); counter <= maxAttempts; counter++) {
      const path = join(destinationDir, `${stem}_${counter}${extension}`);
      if (!await this.exists(path)) {
        return { path, counter };
      }
    }

    return null;
  }

  /** Returns false when `destination` already exists. */
  private async place (source: string, destination: string): Promise<boolean> {
    try {
      await link(source, destination);
    } catch (error) {
      const code = errorCode(error);
      if (code === 'EEXIST') {
        return false;
      }
      if (code === 'EXDEV') {
        return await this.copyAcrossDevices(source, destination);
      }
      if (code !== undefined && LINK_UNSUPPORTED.has(code)) {
        return await this.renameInto(source, destination);
      }
      throw error;
    }

    await this.unlinkSourceOrRollback(source, destination);
    return true;
  }

  private async renameInto (source: string, destination: string): Promise<boolean> {
    if (await this.exists(destination)) {
      return false;
    }
    await rename(source, destination);
    return true;
  }

  /**
   * The copy is written under a hidden temporary name and only then placed,
   * so `destination` never holds a partial file.
   */
  private async copyAcrossDevices (source: string, destination: string): Promise<boolean> {
    const temp = join(
      dirname(destination),
      `.${basename(destination)}.${randomBytes(6).toString('hex')}.partial`
    );

    try {
      await copyFile(source, temp, constants.COPYFILE_EXCL);

      let placed: boolean;
      try {
        await link(temp, destination);
        placed = true;
      } catch (error) {
        const code = errorCode(error);
        if (code === 'EEXIST') {
          placed = false;
        } else if (code !== undefined && LINK_UNSUPPORTED.has(code)) {
          placed = await this.renameInto(temp, destination);
        } else {
          throw error;
        }
      }

      if (placed) {
        await this.unlinkSourceOrRollback(source, destination);
      }
      return placed;
    } finally {
      await rm(temp, { force: true });
    }
  }

  private async unlinkSourceOrRollback (source: string, destination: string): Promise<void> {
    try {
      await unlink(source);
    } catch (error) {
      try {
        await unlink(destination);
      } catch (rollbackError) {
        this.logger.warn(`Could not remove ${destination} after a failed move: ${describeError(rollbackError)}`);
      }
      throw error;
    }
  }

  private async exists (path: string): Promise<boolean> {
    try {
      await lstat(path);
      return true;
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private fail (source: string, error: MoveError): MoveFailure {
    this.logger.debug(error.message);
    return { success: false, source, error };
  }
}
