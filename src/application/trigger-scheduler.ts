import type { Logger } from 'pino';
import { SourceReadError } from '../domain/index.js';
import { sleepUntilAborted } from './retry.js';

export type TriggerState = 'idle' | 'accumulating' | 'cutting' | 'dispatching';

/**
 * Where the scheduler pulls windows from.
 *
 * `closeWindow` fixes the end of the current accumulation window;
 * `nextSlice` returns up to `limit` further records of that window and an
 * empty array once it is drained.
 */
export interface TriggerSource<W, R> {
  closeWindow(): Promise<W>;
  nextSlice(window: W, limit: number): Promise<R[]>;
}

export type DispatchHandler<R> = (slice: R[]) => Promise<void>;

export interface TriggerSchedulerOptions {
  intervalMs: number;
  maxRecordsPerTrigger: number;
  now?: () => number;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export interface TriggerOutcome {
  readonly slices: number;
  readonly records: number;
}

/**
 * Cuts micro-batch windows on a fixed interval and dispatches them one
 * slice at a time.
 *
 * Only one trigger runs at a time. When a dispatch outlasts the interval,
 * the missed ticks collapse into a single trigger that fires as soon as
 * the dispatch returns.
 */
export class TriggerScheduler<W, R> {
  private state: TriggerState = 'idle';
  private triggers = 0;
  private idleTriggers = 0;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(
    private readonly source: TriggerSource<W, R>,
    private readonly dispatch: DispatchHandler<R>,
    private readonly log: Logger,
    private readonly options: TriggerSchedulerOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleepUntilAborted;
  }

  getState(): TriggerState {
    return this.state;
  }

  stats(): { triggers: number; idle_triggers: number } {
    return { triggers: this.triggers, idle_triggers: this.idleTriggers };
  }

  /**
   * Closes the current window and dispatches it in capped slices.
   * An empty window dispatches nothing. When `signal` aborts, the slice
   * in flight finishes and the rest of the window is left for later.
   */
  async trigger(signal?: AbortSignal): Promise<TriggerOutcome> {
    this.triggers++;
    this.state = 'cutting';
    let slices = 0;
    let records = 0;

    try {
      const window = await this.read(() => this.source.closeWindow());

      while (!signal?.aborted) {
        this.state = 'cutting';
        const slice = await this.read(() => this.source.nextSlice(window, this.options.maxRecordsPerTrigger));
        if (slice.length === 0) break;

        this.state = 'dispatching';
        await this.dispatch(slice);
        slices++;
        records += slice.length;
      }
    } finally {
      this.state = 'idle';
    }

    if (slices === 0) {
      this.idleTriggers++;
      this.log.trace('Trigger fired on an empty window');
    } else {
      this.log.debug({ slices, records }, 'Trigger dispatched');
    }

    return { slices, records };
  }

  /**
   * Fires `trigger` every `intervalMs` until `signal` aborts.
   * Errors thrown by the dispatch handler end the loop and propagate, as
   * do source failures wrapped in SourceReadError.
   */
  async run(signal: AbortSignal): Promise<void> {
    let nextAt = this.now() + this.options.intervalMs;

    while (!signal.aborted) {
      this.state = 'accumulating';
      await this.sleep(Math.max(0, nextAt - this.now()), signal);
      if (signal.aborted) break;

      await this.trigger(signal);

      nextAt += this.options.intervalMs;
      const now = this.now();
      if (nextAt < now) nextAt = now;
    }

    this.state = 'idle';
  }

  private async read<T>(op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new SourceReadError(`Source read failed: ${reason}`, { cause: err });
    }
  }
}
