import type { Instance } from './instance.js';
import { createLogger } from './logger.js';

const logger = createLogger('registry');

export interface Slot {
  instance: Instance;
  refs: number;
}

/**
 * One counted reference to a shared instance. Releasing it more than once is
 * a no-op.
 */
export class SharedInstance {
  private released = false;

  constructor(
    private readonly registry: SharedInstanceRegistry,
    private readonly slot: Slot
  ) {}

  get instance(): Instance {
    return this.slot.instance;
  }

  get isReleased(): boolean {
    return this.released;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await this.registry.drop(this.slot);
  }

  /** Synchronous release; the last reference kills the instance with `stopSync()`. */
  releaseSync(): void {
    if (this.released) return;
    this.released = true;
    this.registry.dropSync(this.slot);
  }
}

/**
 * Hands out references to a single lazily started instance.
 *
 * The instance lives as long as at least one `SharedInstance` is unreleased.
 * When the last one goes, the slot is emptied and the instance stopped; the
 * next `acquire()` starts a fresh one.
 */
export class SharedInstanceRegistry {
  private slot: Slot | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly launch: () => Promise<Instance>) {}

  /** The live instance, if any. */
  get current(): Instance | undefined {
    return this.slot?.instance;
  }

  get references(): number {
    return this.slot?.refs ?? 0;
  }

  /**
   * Check-then-launch runs as one critical section: concurrent callers queue
   * behind a launch instead of starting a second instance.
   */
  acquire(): Promise<SharedInstance> {
    return this.exclusive(async () => {
      const existing = this.slot;
      if (existing) {
        existing.refs += 1;
        return new SharedInstance(this, existing);
      }

      const instance = await this.launch();
      const slot: Slot = { instance, refs: 1 };
      this.slot = slot;
      instance.once('exit', () => {
        if (this.slot === slot) {
          logger.warn({ port: instance.port }, 'Shared instance died, next acquire starts a new one');
          this.slot = null;
        }
      });
      logger.debug({ port: instance.port }, 'Started shared instance');
      return new SharedInstance(this, slot);
    });
  }

  /** Synchronous teardown of the live instance, for process exit. */
  reapSync(): void {
    const slot = this.slot;
    if (!slot) return;
    this.slot = null;
    slot.instance.stopSync();
  }

  /** @internal Called by `SharedInstance.release()`. */
  async drop(slot: Slot): Promise<void> {
    slot.refs -= 1;
    if (slot.refs > 0) return;

    // Emptied synchronously, so a concurrent acquire never sees a stopping instance.
    if (this.slot === slot) {
      this.slot = null;
    }
    logger.debug({ port: slot.instance.port }, 'Last reference released, stopping shared instance');
    await slot.instance.stop();
  }

  /** @internal Called by `SharedInstance.releaseSync()`. */
  dropSync(slot: Slot): void {
    slot.refs -= 1;
    if (slot.refs > 0) return;

    if (this.slot === slot) {
      this.slot = null;
    }
    slot.instance.stopSync();
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
