import { Injectable } from '@nestjs/common';
import { promises as fsp } from 'fs';
import * as path from 'path';
import { LoggerService } from '../services/logger.service';
import {
  describeCause,
  PipelineStageName,
  WriteError,
} from '../errors/pipeline.errors';

export interface StagedFile {
  target: string;
  temp: string;
}

interface Replacement extends StagedFile {
  backup: string | null;
  published: boolean;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Local file storage for the bronze, silver and gold layers.
 *
 * Every artifact is written under a hidden temporary name in its destination
 * directory and renamed into place only once all files of the batch are
 * complete. Previous artifacts are set aside first and restored if any file
 * of the batch cannot be published.
 */
@Injectable()
export class FileStorageService {
  constructor(private readonly logger: LoggerService) {
    this.logger.setContext(FileStorageService.name);
  }

  tempPathFor(target: string): string {
    return this.hiddenPathFor(target, 'tmp');
  }

  /**
   * Stage `targets`, let `write` fill the temporary files, then publish them
   * all. On any failure the temporary files are removed, every target is
   * put back as it was and a WriteError is thrown.
   */
  async writeAtomic(
    stage: PipelineStageName,
    targets: string[],
    write: (staged: StagedFile[]) => Promise<void>,
  ): Promise<void> {
    const staged = targets.map((target) => ({
      target,
      temp: this.tempPathFor(target),
    }));

    try {
      for (const { target } of staged) {
        await fsp.mkdir(path.dirname(target), { recursive: true });
      }
      await write(staged);
    } catch (error) {
      await this.discard(staged.map((file) => file.temp));
      const description = targets.join(', ');
      this.logger.error(
        `Failed to stage ${description}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new WriteError(stage, description, { cause: error });
    }

    const replacements: Replacement[] = [];
    let current = targets[0];
    try {
      for (const file of staged) {
        current = file.target;
        replacements.push({ ...file, backup: await this.setAside(file.target), published: false });
      }
      for (const replacement of replacements) {
        current = replacement.target;
        await fsp.rename(replacement.temp, replacement.target);
        replacement.published = true;
      }
    } catch (error) {
      await this.restore(replacements);
      await this.discard(staged.map((file) => file.temp));
      this.logger.error(
        `Failed to publish ${current}`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new WriteError(stage, current, { cause: error });
    }

    await this.discard(
      replacements.flatMap(({ backup }) => (backup === null ? [] : [backup])),
    );
    for (const { target } of replacements) {
      this.logger.debug(`Published ${target}`);
    }
  }

  private hiddenPathFor(target: string, suffix: 'tmp' | 'bak'): string {
    const dir = path.dirname(target);
    const base = path.basename(target);
    return path.join(dir, `.${base}.${process.pid}.${Date.now()}.${suffix}`);
  }

  /** Move an existing target out of the way; null when there was none. */
  private async setAside(target: string): Promise<string | null> {
    const stat = await fsp.lstat(target).catch((error: unknown) => {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    });
    if (stat === null) {
      return null;
    }
    if (!stat.isFile()) {
      throw new Error(`${target} is not a regular file`);
    }

    const backup = this.hiddenPathFor(target, 'bak');
    await fsp.rename(target, backup);
    return backup;
  }

  private async restore(replacements: Replacement[]): Promise<void> {
    for (const { target, backup, published } of [...replacements].reverse()) {
      try {
        if (backup !== null) {
          await fsp.rename(backup, target);
        } else if (published) {
          await fsp.rm(target, { force: true });
        }
      } catch (error) {
        this.logger.error(
          `Could not restore ${target}`,
          error instanceof Error ? error.stack : String(error),
        );
      }
    }
  }

  private async discard(files: string[]): Promise<void> {
    for (const file of files) {
      try {
        await fsp.rm(file, { force: true });
      } catch (error) {
        this.logger.warn(`Could not remove ${file}: ${describeCause(error)}`);
      }
    }
  }
}
