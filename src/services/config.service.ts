import { injectable, singleton } from 'tsyringe';
import { resolve, join, sep } from 'path';
import { existsSync, readFileSync, mkdirSync, writeFileSync } from 'fs';
import type { CategoryMap, OrganizerConfig } from '../types/config';
import {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  FALLBACK_CATEGORY,
  MAX_TIMER_DELAY_MS
} from '../types/config';
import { describeError } from '../utils/errors';
import pc from 'picocolors';

export interface ConfigValidation {
  valid: boolean
  errors: string[]
  warnings: string[]
}

@singleton()
@injectable()
export class ConfigService {
  private config: OrganizerConfig = { ...DEFAULT_CONFIG };

  constructor () {
    this.loadFromEnvironment();
  }

  private loadFromEnvironment (): void {
    const env = process.env;
    if (env.FOLDER_ORGANIZER_DIR) this.config.targetDirectory = resolve(env.FOLDER_ORGANIZER_DIR);
    if (env.FOLDER_ORGANIZER_SETTLE_DELAY_MS) this.config.settleDelayMs = parseInt(env.FOLDER_ORGANIZER_SETTLE_DELAY_MS);
    if (env.FOLDER_ORGANIZER_MAX_NAME_ATTEMPTS) this.config.maxNameAttempts = parseInt(env.FOLDER_ORGANIZER_MAX_NAME_ATTEMPTS);
    if (env.FOLDER_ORGANIZER_DEBUG) this.config.debug = env.FOLDER_ORGANIZER_DEBUG === 'TRUE';
    if (env.FOLDER_ORGANIZER_SILENT) this.config.silent = env.FOLDER_ORGANIZER_SILENT === 'TRUE';
  }

  static configPathFor (directory: string): string {
    return join(resolve(directory), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
  }

  /**
   * Merges `<directory>/.folder-organizer/config.json` over the current values.
   * A missing file is not an error; an unreadable one is reported and ignored.
   */
  loadFromFile (directory?: string): void {
    const configPath = ConfigService.configPathFor(directory ?? this.config.targetDirectory);
    if (!existsSync(configPath)) {
      return;
    }

    try {
      const fileConfig: unknown = JSON.parse(readFileSync(configPath, 'utf8'));
      this.config = { ...this.config, ...this.pickKnownKeys(fileConfig) };

      if (this.config.debug) {
        console.log(pc.gray(`Loaded config from ${configPath}`));
      }
    } catch (error) {
      console.error(pc.red(`Error loading config from ${configPath}:`), describeError(error));
    }
  }

  private pickKnownKeys (raw: unknown): Partial<OrganizerConfig> {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new Error('config file must contain a JSON object');
    }

    const picked: Partial<OrganizerConfig> = {};
    const entries = new Map(Object.entries(raw));

    const categories = entries.get('categories');
    if (categories !== undefined) picked.categories = this.parseCategories(categories);

    const settleDelayMs = entries.get('settleDelayMs');
    if (typeof settleDelayMs === 'number') picked.settleDelayMs = settleDelayMs;

    const maxNameAttempts = entries.get('maxNameAttempts');
    if (typeof maxNameAttempts === 'number') picked.maxNameAttempts = maxNameAttempts;

    const debug = entries.get('debug');
    if (typeof debug === 'boolean') picked.debug = debug;

    const silent = entries.get('silent');
    if (typeof silent === 'boolean') picked.silent = silent;

    return picked;
  }

  private parseCategories (raw: unknown): CategoryMap {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new Error('"categories" must map category names to extension lists');
    }

    const categories: CategoryMap = {};
    for (const [label, extensions] of Object.entries(raw)) {
      if (!Array.isArray(extensions) || !extensions.every((ext): ext is string => typeof ext === 'string')) {
        throw new Error(`"categories.${label}" must be a list of extensions`);
      }
      categories[label] = extensions;
    }
    return categories;
  }

  setFromCliOptions (options: Partial<OrganizerConfig>): void {
    this.config = { ...this.config, ...options };
  }

  setTargetDirectory (path: string): void {
    this.config.targetDirectory = resolve(path);
  }

  getConfig (): Readonly<OrganizerConfig> {
    return { ...this.config };
  }

  validate (): ConfigValidation {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { categories, settleDelayMs, maxNameAttempts } = this.config;

    if (!Number.isInteger(settleDelayMs) || settleDelayMs < 0) {
      errors.push('Settle delay must be a non-negative number of milliseconds');
    } else if (settleDelayMs > MAX_TIMER_DELAY_MS) {
      errors.push(`Settle delay must not exceed ${MAX_TIMER_DELAY_MS} milliseconds`);
    }

    if (!Number.isInteger(maxNameAttempts) || maxNameAttempts < 1) {
      errors.push('Max name attempts must be a positive integer');
    }

    const owners = new Map<string, string>();
    for (const [label, extensions] of Object.entries(categories)) {
      if (label.trim().length === 0) {
        errors.push('Category names must not be empty');
        continue;
      }
      if (label === '.' || label === '..' || label.includes('/') || label.includes(sep)) {
        errors.push(`Category name is not a valid folder name: ${label}`);
      }
      if (label === FALLBACK_CATEGORY) {
        errors.push(`Category "${FALLBACK_CATEGORY}" is reserved for unmatched files`);
      }

      for (const extension of extensions) {
        if (!extension.startsWith('.') || extension.length < 2) {
          errors.push(`Extension "${extension}" in "${label}" must start with a dot`);
          continue;
        }
        const normalized = extension.toLowerCase();
        const owner = owners.get(normalized);
        if (owner !== undefined && owner !== label) {
          warnings.push(`Extension ${normalized} is listed in both "${owner}" and "${label}"; "${owner}" wins`);
        } else {
          owners.set(normalized, label);
        }
      }
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * Writes the current category table and timing options to the directory's
   * config file. Returns false when a config file is already present.
   */
  writeConfigFile (directory: string): boolean {
    const configPath = ConfigService.configPathFor(directory);
    if (existsSync(configPath)) {
      return false;
    }

    mkdirSync(join(resolve(directory), CONFIG_DIR_NAME), { recursive: true });
    const { categories, settleDelayMs, maxNameAttempts } = this.config;
    writeFileSync(configPath, JSON.stringify({ categories, settleDelayMs, maxNameAttempts }, null, 2) + '\n', 'utf8');
    return true;
  }
}
