import type { Command } from 'commander';
import { container } from 'tsyringe';
import { existsSync } from 'fs';
import { resolve } from 'path';
import { input, checkbox } from '@inquirer/prompts';
import { ConfigService } from '../services/config.service';
import { DirectoryValidationService } from '../services/directory-validation.service';
import type { CategoryMap } from '../types/config';
import { DEFAULT_CATEGORIES, DEFAULT_CONFIG } from '../types/config';
import pc from 'picocolors';

export class InitCommand {
  public static register (program: Command): void {
    program
      .command('init [directory]')
      .description('Write a folder-organizer config file for the directory')
      .action(async (directory: string | undefined) => {
        await InitCommand.execute(resolve(directory ?? process.cwd()));
      });
  }

  private static async execute (directory: string): Promise<void> {
    const validation = container.resolve(DirectoryValidationService).validateDirectory(directory);
    if (!validation.isValid) {
      validation.errors.forEach(error => { console.error(pc.red(error)); });
      process.exit(1);
    }

    const configPath = ConfigService.configPathFor(directory);
    console.log(pc.cyan('\n📂 Folder organizer setup\n'));
    console.log(pc.gray(`Target directory: ${directory}\n`));

    if (existsSync(configPath)) {
      console.log(pc.yellow('⚠️  A config file already exists at:'));
      console.log(pc.gray(`   ${configPath}`));
      console.log(pc.red('\nAborting to avoid overwriting it.'));
      process.exit(1);
    }

    try {
      const selected = await checkbox({
        message: 'Which categories should get their own folder?',
        choices: Object.keys(DEFAULT_CATEGORIES).map(label => ({
          name: `${label} (${DEFAULT_CATEGORIES[label].join(' ')})`,
          value: label,
          checked: true
        }))
      });

      const settleDelay = await input({
        message: 'How long should a new file sit before it is moved (ms)?',
        default: String(DEFAULT_CONFIG.settleDelayMs),
        validate: (value) => {
          const delay = Number(value);
          if (!Number.isInteger(delay) || delay < 0) {
            return 'Please enter a whole number of milliseconds';
          }
          return true;
        }
      });

      const categories: CategoryMap = {};
      for (const label of selected) {
        categories[label] = DEFAULT_CATEGORIES[label];
      }

      const config = container.resolve(ConfigService);
      config.setFromCliOptions({ categories, settleDelayMs: Number(settleDelay) });
      config.writeConfigFile(directory);

      console.log(pc.green(`\n✓ Created file: ${configPath}`));
      console.log(pc.gray(`  Categories:    ${selected.length > 0 ? selected.join(', ') : '(none, everything goes to others)'}`));
      console.log(pc.gray(`  Settle delay:  ${settleDelay}ms\n`));
      console.log(pc.cyan('Next steps:'));
      console.log(pc.gray('  • Edit the config file to add your own extensions'));
      console.log(pc.gray('  • Run "folder-organizer watch" to keep the folder tidy\n'));
    } catch (error) {
      if (error instanceof Error && error.name === 'ExitPromptError') {
        console.log(pc.yellow('\n\nSetup cancelled by user.'));
        return;
      }
      throw error;
    }
  }
}
