import 'reflect-metadata';
import { injectable, singleton, inject } from 'tsyringe';
import { watch } from 'fs';
import type { FSWatcher, WatchEventType } from 'fs';
import { lstat } from 'fs/promises';
import { basename, join } from 'path';
import { ClassifierService } from './classifier.service';
import { FileMoverService } from './file-mover.service';
import { DirectoryValidationService } from './directory-validation.service';
import { ConfigService } from './config.service';
import { Logger } from './logger.service';
import type { ILogger } from './logger.service';
import { WatchStartError, describeError, errorCode } from '../utils/errors';

export type WatchOutcome = 'moved' | 'error'

export interface WatchOutcomeEvent {
  outcome: WatchOutcome
  fileName: string
  /** Category label when moved, failure description otherwise. */
  detail: string
  destination?: string
}

export type WatchEventHandler = (event: WatchOutcomeEvent) => void

export interface WatchEvent {
  path: string
}

export type WatchSubscription =
  | { state: 'stopped' }
  | { state: 'running', targetDirectory: string }

interface ActiveWatch {
  targetDirectory: string
  onEvent: WatchEventHandler
  watcher: FSWatcher | null
  queue: WatchEvent[]
  draining: boolean
  /** Paths being processed, mapped to whether another notification came in meanwhile. */
  pending: Map<string, boolean>
  inFlight: Set<Promise<void>>
  closed: boolean
}

const STOPPED: WatchSubscription = Object.freeze({ state: 'stopped' });

/**
 * Moves files into category folders as they appear in a watched directory.
 *
 * Notifications only enqueue; a drain loop turns each queued event into its
 * own task (settle delay, classify, move, report), so settle waits for
 * different files overlap. The directory is watched non-recursively: the
 * category folders the pipeline creates must not feed events back into it.
 *
 * `start` on the directory already being watched keeps the subscription and
 * routes later outcomes to the new `onEvent`. `start` on another directory
 * stops the current watch first.
 */
@singleton()
@injectable()
export class WatchPipelineService {
  private active: ActiveWatch | null = null;
  private lifecycle: Promise<void> = Promise.resolve();

  constructor (
    @inject(ClassifierService) private readonly classifier: ClassifierService,
    @inject(FileMoverService) private readonly mover: FileMoverService,
    @inject(DirectoryValidationService) private readonly directoryValidation: DirectoryValidationService,
    @inject(ConfigService) private readonly configService: ConfigService,
    @inject(Logger) private readonly logger: ILogger
  ) {}

  async start (targetDir: string, onEvent: WatchEventHandler): Promise<WatchSubscription> {
    return await this.serialize(async () => await this.startNow(targetDir, onEvent));
  }

  /**
   * Closes the notification source and waits until every event received
   * before the call has delivered its outcome. Nothing is delivered after the
   * returned promise resolves. Safe to call when nothing is running.
   */
  async stop (): Promise<void> {
    await this.serialize(async () => { await this.stopNow(); });
  }

  isRunning (): boolean {
    return this.active !== null;
  }

  getTargetDirectory (): string | null {
    return this.active?.targetDirectory ?? null;
  }

  getSubscription (): WatchSubscription {
    return this.active
      ? { state: 'running', targetDirectory: this.active.targetDirectory }
      : STOPPED;
  }

  private async serialize<T> (operation: () => Promise<T>): Promise<T> {
    const run = this.lifecycle.then(operation);
    // failures reach the caller through `run`; the chain itself keeps going
    this.lifecycle = run.then(() => undefined, () => undefined);
    return await run;
  }

  private async startNow (targetDir: string, onEvent: WatchEventHandler): Promise<WatchSubscription> {
    const directory = this.directoryValidation.requireDirectory(targetDir);

    if (this.active) {
      if (this.active.targetDirectory === directory) {
        this.logger.debug(`Already watching ${directory}`);
        this.active.onEvent = onEvent;
        return this.getSubscription();
      }
      await this.stopNow();
    }

    const active: ActiveWatch = {
      targetDirectory: directory,
      onEvent,
      watcher: null,
      queue: [],
      draining: false,
      pending: new Map(),
      inFlight: new Set(),
      closed: false
    };

    let watcher: FSWatcher;
    try {
      watcher = watch(directory, { recursive: false, persistent: true }, (eventType, filename) => {
        this.notify(active, eventType, filename);
      });
    } catch (error) {
      throw new WatchStartError(directory, error);
    }

    active.watcher = watcher;
    watcher.on('error', (error: Error) => {
      this.logger.error(`File watcher error for ${directory}: ${error.message}`);
      this.deliver(active, { outcome: 'error', fileName: directory, detail: `watch failed: ${error.message}` });
      this.stopAfterFailure(active);
    });

    this.active = active;
    this.logger.info(`Watching ${directory}`);
    return this.getSubscription();
  }

  private async stopNow (): Promise<void> {
    const active = this.active;
    if (!active) {
      return;
    }

    this.active = null;
    active.closed = true;
    active.watcher?.close();

    // events queued before the close still get processed and reported
    this.drain(active);
    while (active.inFlight.size > 0) {
      await Promise.allSettled(Array.from(active.inFlight));
    }

    this.logger.info(`Stopped watching ${active.targetDirectory}`);
  }

  private stopAfterFailure (active: ActiveWatch): void {
    this.serialize(async () => {
      if (this.active === active) {
        await this.stopNow();
      }
    }).catch((error: unknown) => {
      this.logger.error(`Failed to stop watch on ${active.targetDirectory}: ${describeError(error)}`);
    });
  }

  private notify (active: ActiveWatch, eventType: WatchEventType, filename: string | null): void {
    // created and removed entries both arrive as 'rename'; content writes as 'change'
    if (active.closed || eventType !== 'rename' || !filename) {
      return;
    }

    active.queue.push({ path: join(active.targetDirectory, filename) });
    if (!active.draining) {
      active.draining = true;
      setImmediate(() => { this.drain(active); });
    }
  }

  private drain (active: ActiveWatch): void {
    let event = active.queue.shift();
    while (event !== undefined) {
      this.dispatch(active, event);
      event = active.queue.shift();
    }
    active.draining = false;
  }

  /**
   * One task per path at a time. A notification for a path that is already
   * being processed is folded into a single re-check once that task ends, so
   * a file dropped again under the same name is not lost.
   */
  private dispatch (active: ActiveWatch, event: WatchEvent): void {
    if (active.pending.has(event.path)) {
      this.logger.debug(`Deferring repeated notification for ${event.path}`);
      active.pending.set(event.path, true);
      return;
    }

    active.pending.set(event.path, false);
    const task: Promise<void> = this.process(active, event).finally(() => {
      const repeated = active.pending.get(event.path) === true;
      active.pending.delete(event.path);
      active.inFlight.delete(task);
      if (repeated) {
        this.dispatch(active, event);
      }
    });
    active.inFlight.add(task);
  }

  private async process (active: ActiveWatch, event: WatchEvent): Promise<void> {
    const fileName = basename(event.path);

    try {
      if (!await this.isCreatedFile(event.path)) {
        return;
      }

      await this.settle();

      const category = this.classifier.categoryForFile(fileName);
      const result = await this.mover.move(event.path, join(active.targetDirectory, category));

      if (result.success) {
        this.deliver(active, { outcome: 'moved', fileName, detail: category, destination: result.destination });
      } else {
        this.deliver(active, { outcome: 'error', fileName, detail: result.error.message });
      }
    } catch (error) {
      this.deliver(active, { outcome: 'error', fileName, detail: describeError(error) });
    }
  }

  // removals (including the pipeline's own moves), folders and symlinks are not file creations
  private async isCreatedFile (path: string): Promise<boolean> {
    try {
      return (await lstat(path)).isFile();
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  private async settle (): Promise<void> {
    const delay = this.configService.getConfig().settleDelayMs;
    if (delay > 0) {
      await new Promise<void>(resolve => setTimeout(resolve, delay));
    }
  }

  private deliver (active: ActiveWatch, event: WatchOutcomeEvent): void {
    try {
      active.onEvent(event);
    } catch (error) {
      this.logger.error(`Watch event handler failed for ${event.fileName}: ${describeError(error)}`);
    }
  }
}
