import 'reflect-metadata';
import { existsSync, mkdirSync, readdirSync, readFileSync, symlinkSync, writeFileSync } from 'fs';
import { join } from 'path';
import { OrganizerService, formatSummary } from '../organizer.service';
import { ClassifierService, buildCategoryTable } from '../classifier.service';
import { FileMoverService } from '../file-mover.service';
import type { MoveResult } from '../file-mover.service';
import { ConfigService } from '../config.service';
import { DirectoryValidationService } from '../directory-validation.service';
import { DEFAULT_CATEGORIES } from '../../types/config';
import { DirectoryNotFoundError, MoveExecutionError } from '../../utils/errors';
import { createMockLogger, makeTempDir, removeTempDir } from './helpers/test-utils';
import type { ILogger } from '../logger.service';

class SelectivelyFailingMover extends FileMoverService {
  constructor (config: ConfigService, logger: ILogger, private readonly failingName: string) {
    super(config, logger);
  }

  async move (source: string, destinationDir: string): Promise<MoveResult> {
    if (source.endsWith(this.failingName)) {
      const error = new MoveExecutionError(source, join(destinationDir, this.failingName), new Error('disk full'));
      return { success: false, source, error };
    }
    return await super.move(source, destinationDir);
  }
}

describe('OrganizerService', () => {
  let root: string;
  let logger: jest.Mocked<ILogger>;
  let config: ConfigService;
  let organizer: OrganizerService;
  const classifier = new ClassifierService(buildCategoryTable(DEFAULT_CATEGORIES));

  const createOrganizer = (mover: FileMoverService): OrganizerService =>
    new OrganizerService(classifier, mover, new DirectoryValidationService(), logger);

  beforeEach(() => {
    root = makeTempDir('organizer');
    logger = createMockLogger();
    config = new ConfigService();
    organizer = createOrganizer(new FileMoverService(config, logger));
  });

  afterEach(() => {
    removeTempDir(root);
  });

  it('sorts loose files into category folders and counts them', async () => {
    writeFileSync(join(root, 'a.jpg'), 'image');
    writeFileSync(join(root, 'b.mp3'), 'audio');
    writeFileSync(join(root, 'c.xyz'), 'unknown');

    const result = await organizer.organize(root);

    expect(result.summary).toEqual({ images: 1, audio: 1, others: 1 });
    expect(result.failures).toEqual([]);
    expect(readdirSync(root).sort()).toEqual(['audio', 'images', 'others']);
    expect(readFileSync(join(root, 'images', 'a.jpg'), 'utf8')).toBe('image');
    expect(readFileSync(join(root, 'audio', 'b.mp3'), 'utf8')).toBe('audio');
    expect(readFileSync(join(root, 'others', 'c.xyz'), 'utf8')).toBe('unknown');
  });

  it('reports each move with its category and destination', async () => {
    writeFileSync(join(root, 'Notes.TXT'), 'text');

    const result = await organizer.organize(root);

    expect(result.moved).toEqual([{
      source: join(root, 'Notes.TXT'),
      destination: join(root, 'documents', 'Notes.TXT'),
      category: 'documents'
    }]);
  });

  it('moves nothing when run again on an organized folder', async () => {
    writeFileSync(join(root, 'a.jpg'), 'image');
    writeFileSync(join(root, 'b.mp3'), 'audio');
    writeFileSync(join(root, 'c.xyz'), 'unknown');
    await organizer.organize(root);

    const rerun = await organizer.organize(root);

    expect(rerun.summary).toEqual({});
    expect(rerun.moved).toEqual([]);
    expect(readdirSync(join(root, 'images'))).toEqual(['a.jpg']);
  });

  it('returns an empty summary for an empty directory', async () => {
    const result = await organizer.organize(root);

    expect(result).toEqual({ summary: {}, moved: [], failures: [] });
  });

  it('returns a frozen summary', async () => {
    writeFileSync(join(root, 'a.jpg'), 'image');

    const result = await organizer.organize(root);

    expect(Object.isFrozen(result.summary)).toBe(true);
  });

  it('counts several files of one category together', async () => {
    writeFileSync(join(root, 'one.png'), '1');
    writeFileSync(join(root, 'two.gif'), '2');
    writeFileSync(join(root, 'three.webp'), '3');

    const result = await organizer.organize(root);

    expect(result.summary).toEqual({ images: 3 });
  });

  it('leaves subdirectories and their contents alone', async () => {
    mkdirSync(join(root, 'projects'));
    writeFileSync(join(root, 'projects', 'plan.pdf'), 'plan');
    writeFileSync(join(root, 'song.flac'), 'audio');

    const result = await organizer.organize(root);

    expect(result.summary).toEqual({ audio: 1 });
    expect(existsSync(join(root, 'projects', 'plan.pdf'))).toBe(true);
  });

  it('skips symbolic links', async () => {
    writeFileSync(join(root, 'real.jpg'), 'image');
    symlinkSync(join(root, 'real.jpg'), join(root, 'alias.jpg'));

    const result = await organizer.organize(root);

    expect(result.summary).toEqual({ images: 1 });
    expect(readdirSync(root).sort()).toEqual(['alias.jpg', 'images']);
  });

  it('numbers files that collide with earlier runs', async () => {
    mkdirSync(join(root, 'images'));
    writeFileSync(join(root, 'images', 'photo.png'), 'old');
    writeFileSync(join(root, 'photo.png'), 'new');

    const result = await organizer.organize(root);

    expect(result.moved[0].destination).toBe(join(root, 'images', 'photo_1.png'));
    expect(readFileSync(join(root, 'images', 'photo.png'), 'utf8')).toBe('old');
  });

  it('records a failed file and carries on with the rest', async () => {
    organizer = createOrganizer(new SelectivelyFailingMover(config, logger, 'stuck.pdf'));
    writeFileSync(join(root, 'stuck.pdf'), 'stuck');
    writeFileSync(join(root, 'fine.zip'), 'fine');

    const result = await organizer.organize(root);

    expect(result.summary).toEqual({ archives: 1 });
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]).toMatchObject({ source: join(root, 'stuck.pdf'), category: 'documents' });
    expect(result.failures[0].error).toBeInstanceOf(MoveExecutionError);
    expect(existsSync(join(root, 'stuck.pdf'))).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      `Failed to move stuck.pdf: Cannot move ${join(root, 'stuck.pdf')} to ${join(root, 'documents', 'stuck.pdf')}: disk full`
    );
  });

  it('rejects a missing directory before moving anything', async () => {
    await expect(organizer.organize(join(root, 'missing'))).rejects.toBeInstanceOf(DirectoryNotFoundError);
  });

  it('rejects a path that is a file', async () => {
    const file = join(root, 'plain.txt');
    writeFileSync(file, 'text');

    await expect(organizer.organize(file)).rejects.toThrow(`Path is not a directory: ${file}`);
    expect(existsSync(file)).toBe(true);
  });
});

describe('formatSummary', () => {
  it('lists categories with their counts', () => {
    expect(formatSummary({ images: 2, others: 1 })).toBe('images: 2, others: 1');
  });

  it('says so when nothing moved', () => {
    expect(formatSummary({})).toBe('no files moved');
  });
});
