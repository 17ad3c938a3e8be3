import defaultCategories from '../data/default-categories.json';

export type CategoryMap = Record<string, string[]>

export interface OrganizerConfig {
  targetDirectory: string
  categories: CategoryMap

  settleDelayMs: number
  maxNameAttempts: number

  debug: boolean
  silent: boolean
}

export const FALLBACK_CATEGORY = 'others';

export const CONFIG_DIR_NAME = '.folder-organizer';
export const CONFIG_FILE_NAME = 'config.json';

// setTimeout clamps anything larger to 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const DEFAULT_CATEGORIES: CategoryMap = defaultCategories;

export const DEFAULT_CONFIG: OrganizerConfig = {
  targetDirectory: process.cwd(),
  categories: DEFAULT_CATEGORIES,

  settleDelayMs: 1000,
  maxNameAttempts: 10000,

  debug: false,
  silent: false
};
