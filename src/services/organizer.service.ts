import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { join } from 'path';
import { ClassifierService } from './classifier.service';
import { FileMoverService } from './file-mover.service';
import { DirectoryValidationService } from './directory-validation.service';
import { Logger } from './logger.service';
import type { ILogger } from './logger.service';
import { DirectoryNotFoundError } from '../utils/errors';
import type { MoveError } from '../utils/errors';

export type OrganizeSummary = Readonly<Record<string, number>>

export interface MovedFile {
  source: string
  destination: string
  category: string
}

export interface FailedFile {
  source: string
  category: string
  error: MoveError
}

export interface OrganizeResult {
  summary: OrganizeSummary
  moved: MovedFile[]
  failures: FailedFile[]
}

export function formatSummary (summary: OrganizeSummary): string {
  const parts = Object.entries(summary).map(([category, count]) => `${category}: ${count}`);
  return parts.length > 0 ? parts.join(', ') : 'no files moved';
}

@injectable()
export class OrganizerService {
  constructor (
    @inject(ClassifierService) private readonly classifier: ClassifierService,
    @inject(FileMoverService) private readonly mover: FileMoverService,
    @inject(DirectoryValidationService) private readonly directoryValidation: DirectoryValidationService,
    @inject(Logger) private readonly logger: ILogger
  ) {}

  /**
   * Moves every regular file sitting directly in `targetDir` into
   * `targetDir/<category>`. Subdirectories (category folders included) are
   * never entered, so a second run over an organized folder moves nothing.
   * Files are moved one at a time, in listing order.
   */
  async organize (targetDir: string): Promise<OrganizeResult> {
    const directory = this.directoryValidation.requireDirectory(targetDir);

    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      throw new DirectoryNotFoundError(directory, 'Directory cannot be listed', error);
    }

    const counts: Record<string, number> = {};
    const moved: MovedFile[] = [];
    const failures: FailedFile[] = [];

    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }

      const source = join(directory, entry.name);
      const category = this.classifier.categoryForFile(entry.name);
      const result = await this.mover.move(source, join(directory, category));

      if (result.success) {
        counts[category] = (counts[category] ?? 0) + 1;
        moved.push({ source, destination: result.destination, category });
      } else {
        this.logger.warn(`Failed to move ${entry.name}: ${result.error.message}`);
        failures.push({ source, category, error: result.error });
      }
    }

    this.logger.debug(`Organized ${directory}: ${formatSummary(counts)} (${failures.length} failed)`);
    return { summary: Object.freeze(counts), moved, failures };
  }
}
