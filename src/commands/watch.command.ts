import type { Command } from 'commander';
import { container } from 'tsyringe';
import { BootstrapService } from '../services/bootstrap.service';
import type { RunOptions } from '../services/bootstrap.service';
import type { Application } from '../app';
import { describeError } from '../utils/errors';
import pc from 'picocolors';

interface WatchCommandOptions {
  settleDelay?: string
  maxNameAttempts?: string
  organizeFirst?: boolean
  debug?: boolean
  silent?: boolean
}

export class WatchCommand {
  public static register (program: Command): void {
    program
      .command('watch [directory]')
      .description('Keep the directory organized, moving new files as they appear')
      .option('--settle-delay <ms>', 'wait this long after a file appears before moving it')
      .option('--max-name-attempts <count>', 'give up on a file after this many suffixed names')
      .option('--organize-first', 'organize the files already present before watching')
      .option('-d, --debug', 'enable debug logging')
      .option('-s, --silent', 'only print errors')
      .action(async (directory: string | undefined, options: WatchCommandOptions) => {
        await WatchCommand.execute({ ...options, directory }, Boolean(options.organizeFirst));
      });
  }

  private static async execute (options: RunOptions, organizeFirst: boolean): Promise<void> {
    const bootstrap = container.resolve(BootstrapService);

    let app: Application;
    try {
      app = bootstrap.prepare(options);
      await app.startWatching({ organizeFirst });
    } catch (error) {
      console.error(pc.red('[organizer] Failed to start watching:'), describeError(error));
      process.exit(1);
    }

    const shutdown = (): void => {
      app.stop().catch((error: unknown) => {
        console.error(pc.red('[organizer] Failed to stop cleanly:'), describeError(error));
        process.exitCode = 1;
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }
}
