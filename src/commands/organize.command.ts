import type { Command } from 'commander';
import { container } from 'tsyringe';
import { BootstrapService } from '../services/bootstrap.service';
import type { RunOptions } from '../services/bootstrap.service';
import { describeError } from '../utils/errors';
import pc from 'picocolors';

interface OrganizeCommandOptions {
  maxNameAttempts?: string
  debug?: boolean
  silent?: boolean
}

export class OrganizeCommand {
  public static register (program: Command): void {
    program
      .command('organize [directory]', { isDefault: true })
      .description('Move every file in the directory into its category folder')
      .option('--max-name-attempts <count>', 'give up on a file after this many suffixed names')
      .option('-d, --debug', 'enable debug logging')
      .option('-s, --silent', 'only print errors')
      .action(async (directory: string | undefined, options: OrganizeCommandOptions) => {
        await OrganizeCommand.execute({ ...options, directory });
      });
  }

  private static async execute (options: RunOptions): Promise<void> {
    const bootstrap = container.resolve(BootstrapService);

    try {
      const app = bootstrap.prepare(options);
      const result = await app.organizeNow();
      if (result.failures.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error(pc.red('[organizer] Organize failed:'), describeError(error));
      process.exit(1);
    }
  }
}
