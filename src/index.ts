#!/usr/bin/env node
import 'reflect-metadata';
import { Command } from 'commander';
import pc from 'picocolors';
import packageJson from '../package.json';
import { OrganizeCommand } from './commands/organize.command';
import { WatchCommand } from './commands/watch.command';
import { InitCommand } from './commands/init.command';

async function main () {
  const program = new Command();

  program
    .name('folder-organizer')
    .description('Sort the files of a directory into category folders')
    .version(packageJson.version);

  OrganizeCommand.register(program);
  WatchCommand.register(program);
  InitCommand.register(program);

  await program.parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error) => {
    console.error(pc.red('Fatal error:'), error);
    process.exit(1);
  });
}

export { main };
export { Application } from './app';
export { ClassifierService, CATEGORY_TABLE, buildCategoryTable, extensionOf } from './services/classifier.service';
export type { ExtensionCategoryTable, CategoryEntry } from './services/classifier.service';
export { FileMoverService } from './services/file-mover.service';
export type { MoveResult, MoveSuccess, MoveFailure } from './services/file-mover.service';
export { OrganizerService, formatSummary } from './services/organizer.service';
export type { OrganizeResult, OrganizeSummary, MovedFile, FailedFile } from './services/organizer.service';
export { WatchPipelineService } from './services/watch-pipeline.service';
export type { WatchOutcomeEvent, WatchEventHandler, WatchSubscription } from './services/watch-pipeline.service';
export * from './utils/errors';
export * from './types/config';
