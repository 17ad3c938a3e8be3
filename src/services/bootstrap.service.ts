import { injectable, singleton, inject, container } from 'tsyringe';
import { Application } from '../app';
import { ConfigService } from './config.service';
import { Logger } from './logger.service';
import { DirectoryValidationService } from './directory-validation.service';
import { CATEGORY_TABLE, buildCategoryTable } from './classifier.service';
import type { OrganizerConfig } from '../types/config';
import { ConfigValidationError, DirectoryNotFoundError } from '../utils/errors';

export interface RunOptions {
  directory?: string
  settleDelay?: string
  maxNameAttempts?: string
  debug?: boolean
  silent?: boolean
}

/**
 * Turns command-line options into a ready Application: validates the target
 * directory, layers its config file and the CLI options over the defaults,
 * validates the result and registers the category table in the container.
 */
@singleton()
@injectable()
export class BootstrapService {
  constructor (
    @inject(ConfigService) private readonly configService: ConfigService,
    @inject(Logger) private readonly logger: Logger,
    @inject(DirectoryValidationService) private readonly directoryValidationService: DirectoryValidationService
  ) {}

  prepare (options: RunOptions): Application {
    const targetDir = options.directory ?? this.configService.getConfig().targetDirectory;
    const validation = this.directoryValidationService.validateDirectory(targetDir);

    if (!validation.isValid) {
      this.logger.error('Invalid target directory:');
      validation.errors.forEach(error => { this.logger.error(`  • ${error}`); });
      throw new DirectoryNotFoundError(validation.resolvedPath, 'Invalid target directory');
    }

    this.configService.setTargetDirectory(validation.resolvedPath);
    this.configService.loadFromFile(validation.resolvedPath);
    this.configService.setFromCliOptions(this.toConfig(options));

    const finalConfig = this.configService.getConfig();
    this.logger.setDebug(finalConfig.debug);
    this.logger.setSilence(finalConfig.silent);

    const configValidation = this.configService.validate();
    configValidation.warnings.forEach(warning => { this.logger.warn(warning); });
    if (!configValidation.valid) {
      this.logger.error('Invalid configuration:');
      configValidation.errors.forEach(error => { this.logger.error(`  • ${error}`); });
      throw new ConfigValidationError(configValidation.errors);
    }

    container.register(CATEGORY_TABLE, { useValue: buildCategoryTable(finalConfig.categories) });
    return container.resolve(Application);
  }

  private toConfig (options: RunOptions): Partial<OrganizerConfig> {
    const cliOptions: Partial<OrganizerConfig> = {};

    if (options.settleDelay !== undefined) {
      cliOptions.settleDelayMs = parseInt(options.settleDelay);
    }
    if (options.maxNameAttempts !== undefined) {
      cliOptions.maxNameAttempts = parseInt(options.maxNameAttempts);
    }
    if (options.debug !== undefined) {
      cliOptions.debug = options.debug;
    }
    if (options.silent !== undefined) {
      cliOptions.silent = options.silent;
    }

    return cliOptions;
  }
}
