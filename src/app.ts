import 'reflect-metadata';
import { injectable, inject } from 'tsyringe';
import { basename, relative } from 'path';
import { ConfigService } from './services/config.service';
import { Logger } from './services/logger.service';
import type { ILogger } from './services/logger.service';
import { OrganizerService, formatSummary } from './services/organizer.service';
import type { OrganizeResult } from './services/organizer.service';
import { WatchPipelineService } from './services/watch-pipeline.service';
import type { WatchOutcomeEvent } from './services/watch-pipeline.service';

export interface WatchOptions {
  organizeFirst?: boolean
}

@injectable()
export class Application {
  constructor (
    @inject(ConfigService) private readonly config: ConfigService,
    @inject(Logger) private readonly logger: ILogger,
    @inject(OrganizerService) private readonly organizer: OrganizerService,
    @inject(WatchPipelineService) private readonly watchPipeline: WatchPipelineService
  ) {}

  async organizeNow (): Promise<OrganizeResult> {
    const { targetDirectory } = this.config.getConfig();
    const result = await this.organizer.organize(targetDirectory);

    for (const file of result.moved) {
      this.logger.info(`Moved: ${basename(file.source)} -> ${relative(targetDirectory, file.destination)}`);
    }
    for (const failure of result.failures) {
      this.logger.error(`Error moving ${basename(failure.source)}: ${failure.error.message}`);
    }

    this.logger.success(`Organization finished → ${formatSummary(result.summary)}`);
    return result;
  }

  async startWatching (options: WatchOptions = {}): Promise<void> {
    const { targetDirectory, settleDelayMs } = this.config.getConfig();

    if (options.organizeFirst) {
      await this.organizeNow();
    }

    await this.watchPipeline.start(targetDirectory, event => { this.reportWatchEvent(event); });
    this.logger.success(`Auto-organize enabled (settle delay ${settleDelayMs}ms), press Ctrl+C to stop`);
  }

  async stop (): Promise<void> {
    if (!this.watchPipeline.isRunning()) {
      return;
    }
    await this.watchPipeline.stop();
    this.logger.info('Auto-organize stopped');
  }

  private reportWatchEvent (event: WatchOutcomeEvent): void {
    if (event.outcome === 'moved') {
      this.logger.info(`Auto-moved: ${event.fileName} → ${event.detail}/`);
    } else {
      this.logger.error(`Error moving ${event.fileName}: ${event.detail}`);
    }
  }
}
