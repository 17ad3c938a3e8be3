import 'reflect-metadata';
import { injectable, singleton } from 'tsyringe';
import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { DirectoryNotFoundError } from '../utils/errors';

export interface DirectoryValidation {
  isValid: boolean
  resolvedPath: string
  errors: string[]
}

@singleton()
@injectable()
export class DirectoryValidationService {
  validateDirectory (directory: string): DirectoryValidation {
    const resolvedPath = resolve(directory);
    const result: DirectoryValidation = {
      isValid: false,
      resolvedPath,
      errors: []
    };

    if (!existsSync(resolvedPath)) {
      result.errors.push(`Directory does not exist: ${resolvedPath}`);
      return result;
    }

    if (!statSync(resolvedPath).isDirectory()) {
      result.errors.push(`Path is not a directory: ${resolvedPath}`);
      return result;
    }

    result.isValid = true;
    return result;
  }

  /** Resolves `directory` to an absolute path, or throws DirectoryNotFoundError. */
  requireDirectory (directory: string): string {
    const resolvedPath = resolve(directory);

    if (!existsSync(resolvedPath)) {
      throw new DirectoryNotFoundError(resolvedPath);
    }
    if (!statSync(resolvedPath).isDirectory()) {
      throw new DirectoryNotFoundError(resolvedPath, 'Path is not a directory');
    }

    return resolvedPath;
  }
}
