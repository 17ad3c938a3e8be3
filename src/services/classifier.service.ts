import { inject, injectable } from 'tsyringe';
import { basename, extname } from 'path';
import type { CategoryMap } from '../types/config';
import { FALLBACK_CATEGORY } from '../types/config';

export interface CategoryEntry {
  label: string
  extensions: ReadonlySet<string>
}

/** Ordered, lowercased category table. Built once at startup. */
export type ExtensionCategoryTable = readonly CategoryEntry[]

export const CATEGORY_TABLE = Symbol('ExtensionCategoryTable');

export function buildCategoryTable (categories: CategoryMap): ExtensionCategoryTable {
  return Object.freeze(
    Object.entries(categories).map(([label, extensions]) => Object.freeze({
      label,
      extensions: new Set(extensions.map(ext => ext.toLowerCase()))
    }))
  );
}

/**
 * Same notion of extension as a path suffix: `archive.tar.gz` gives `.gz`,
 * `.bashrc` and `README` give an empty string.
 */
export function extensionOf (fileName: string): string {
  return extname(basename(fileName));
}

@injectable()
export class ClassifierService {
  constructor (
    @inject(CATEGORY_TABLE) private readonly table: ExtensionCategoryTable
  ) {}

  categoryFor (extension: string): string {
    const normalized = extension.toLowerCase();
    for (const { label, extensions } of this.table) {
      if (extensions.has(normalized)) {
        return label;
      }
    }
    return FALLBACK_CATEGORY;
  }

  categoryForFile (fileName: string): string {
    return this.categoryFor(extensionOf(fileName));
  }

  categories (): string[] {
    return this.table.map(entry => entry.label);
  }
}
