import * as fs from 'fs';
import * as path from 'path';
import type { BoundedQueue } from '../agents/bounded-queue';
import { ReplySlot } from '../agents/reply-slot';
import type { SuggestionJob } from '../agents/suggestion-worker';
import type { WatchEvent } from '../indexer/watcher';
import { CancelledError, QueueClosedError, errorMessage } from '../errors';
import { FALLBACK_DESTINATION } from '../planner/constants';
import { shouldIgnore, type IgnoreSpec } from '../planner/ignore-policy';
import { matchRule, type CompiledRule } from '../planner/rule-matcher';
import { isDirectory } from '../utils/fs';
import { sleep } from '../utils/sleep';
import type { Mover, PlacementOutcome } from './mover';

export type DestinationSource = 'rule' | 'suggestion' | 'fallback';

export type DispatchOutcome =
  | { kind: 'dropped'; reason: string }
  | { kind: 'ignored' }
  | { kind: 'placed'; destination: string; source: DestinationSource; placement: PlacementOutcome }
  | { kind: 'failed'; error: string };

export interface DispatcherOptions {
  root: string;
  rules: CompiledRule[];
  ignore: IgnoreSpec;
  preserveStructure: boolean;
  settleDelayMs: number;
  mover: Mover;
  /** Suggestion job queue; null when suggestions are disabled */
  jobs: BoundedQueue<SuggestionJob> | null;
}

const STOPPING: DispatchOutcome = { kind: 'dropped', reason: 'stopping' };

/**
 * Dispatcher - turns watch events into placements, one event at a time.
 *
 * Every event is chained onto a single tail promise, so events are handled strictly in
 * arrival order and a pending suggestion holds up everything behind it. A failure in one
 * event is logged and the chain continues.
 */
export class Dispatcher {
  private readonly root: string;
  private readonly rules: CompiledRule[];
  private readonly ignore: IgnoreSpec;
  private readonly preserveStructure: boolean;
  private readonly settleDelayMs: number;
  private readonly mover: Mover;
  private readonly jobs: BoundedQueue<SuggestionJob> | null;
  private tail: Promise<void> = Promise.resolve();
  private readonly controller = new AbortController();

  constructor(options: DispatcherOptions) {
    this.root = path.resolve(options.root);
    this.rules = options.rules;
    this.ignore = options.ignore;
    this.preserveStructure = options.preserveStructure;
    this.settleDelayMs = options.settleDelayMs;
    this.mover = options.mover;
    this.jobs = options.jobs;
  }

  /**
   * Queue an event behind every event received before it.
   * The returned promise settles with this event's outcome and never rejects.
   */
  handleEvent(event: WatchEvent): Promise<DispatchOutcome> {
    const outcome = this.tail.then(() => this.process(event));
    this.tail = outcome.then(() => undefined);
    return outcome;
  }

  handleWatchError(error: Error): void {
    console.error(`[Dispatcher] Watcher error:`, error);
  }

  /**
   * Stop accepting work. Events still settling or not yet classified are dropped and
   * their files stay where they are; an event already waiting on a suggestion gets
   * whatever the worker answers.
   */
  close(): void {
    this.controller.abort();
  }

  isClosed(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Resolves once every event handed in so far has been processed.
   */
  onIdle(): Promise<void> {
    return this.tail;
  }

  private async process(event: WatchEvent): Promise<DispatchOutcome> {
    if (this.isClosed()) {
      return STOPPING;
    }
    try {
      return await this.dispatch(event);
    } catch (error) {
      if (error instanceof CancelledError) {
        return STOPPING;
      }
      console.error(`[Dispatcher] Error handling ${event.path}:`, error);
      return { kind: 'failed', error: errorMessage(error) };
    }
  }

  private async dispatch(event: WatchEvent): Promise<DispatchOutcome> {
    if (event.type !== 'create') {
      return { kind: 'dropped', reason: 'not a create event' };
    }

    const filePath = path.resolve(event.path);

    // TODO: treat a new directory as one unit instead of skipping it
    if (await isDirectory(filePath)) {
      console.log(`[Dispatcher] Skipping directory ${filePath}`);
      return { kind: 'dropped', reason: 'directory' };
    }

    if (path.dirname(filePath) !== this.root) {
      return { kind: 'dropped', reason: 'not directly under the watched root' };
    }

    await sleep(this.settleDelayMs, this.controller.signal);

    const name = path.basename(filePath);
    if (!fs.existsSync(filePath)) {
      console.log(`[Dispatcher] ${name} disappeared before it could be sorted`);
      return { kind: 'dropped', reason: 'file no longer exists' };
    }

    console.log(`[Dispatcher] New file detected: ${name}`);

    if (shouldIgnore(filePath, this.ignore)) {
      console.log(`[Dispatcher] Ignored by config: ${name}`);
      return { kind: 'ignored' };
    }

    let source: DestinationSource = 'rule';
    let destination = matchRule(name, this.rules);

    if (destination === undefined && this.jobs) {
      source = 'suggestion';
      const suggested = await this.requestSuggestion(this.jobs, filePath);
      if (suggested === null) {
        console.log(`[Dispatcher] Shutting down, leaving ${name} in place`);
        return STOPPING;
      }
      destination = suggested;
      console.log(`[Dispatcher] Suggested folder for ${name}: ${destination}`);
    }

    destination = (destination ?? '').trim();
    if (!destination) {
      source = 'fallback';
      destination = FALLBACK_DESTINATION;
    }

    const placement = await this.mover.place(filePath, destination, this.preserveStructure);
    return { kind: 'placed', destination, source, placement };
  }

  /**
   * Hand one job to the worker and wait for its single reply.
   * Null when the job could not be queued because the pipeline is stopping.
   */
  private async requestSuggestion(jobs: BoundedQueue<SuggestionJob>, sourcePath: string): Promise<string | null> {
    const job: SuggestionJob = { sourcePath, reply: new ReplySlot<string>() };

    try {
      await jobs.put(job, this.controller.signal);
    } catch (error) {
      if (error instanceof CancelledError || error instanceof QueueClosedError) {
        return null;
      }
      throw error;
    }

    return job.reply.wait();
  }
}
