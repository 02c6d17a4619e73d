/**
 * SuggestionWorker
 *
 * The single long-lived task that asks the suggestion service where a file belongs.
 *
 * Workflow Context:
 * - The dispatcher enqueues one SuggestionJob per unmatched file and awaits its reply
 * - Jobs are taken one at a time in FIFO order; there is never more than one request in flight
 * - Each request first waits on the rate limiter, so the limit applies to the service itself
 * - Every job gets exactly one reply: the trimmed suggestion or FALLBACK_DESTINATION
 *
 * On stop() the loop is cancelled, the queue is closed and every job still waiting
 * is answered with the fallback.
 */
import * as path from 'path';
import { CancelledError, QueueClosedError, errorMessage } from '../errors';
import { FALLBACK_DESTINATION } from '../planner/constants';
import type { BoundedQueue } from './bounded-queue';
import { describeFileMetadata, snapshotFolders } from './file-context';
import type { SuggestionService } from './llm-client';
import { buildSuggestionPrompt } from './prompts/suggestion-prompt';
import type { RateLimiter } from './rate-limiter';
import type { ReplySlot } from './reply-slot';

export interface SuggestionJob {
  sourcePath: string;
  reply: ReplySlot<string>;
}

export interface SuggestionSettings {
  model: string;
  instructions: string;
  knowledgeBase: string;
  preserveStructure: boolean;
}

export interface SuggestionWorkerOptions {
  /** Watched root, listed for the folder snapshot sent with every request */
  root: string;
  jobs: BoundedQueue<SuggestionJob>;
  limiter: RateLimiter;
  service: SuggestionService;
  settings: SuggestionSettings;
}

function isDebug(): boolean {
  return process.env.SORTBOX_DEBUG === '1';
}

export class SuggestionWorker {
  private readonly root: string;
  private readonly jobs: BoundedQueue<SuggestionJob>;
  private readonly limiter: RateLimiter;
  private readonly service: SuggestionService;
  private readonly settings: SuggestionSettings;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(options: SuggestionWorkerOptions) {
    this.root = options.root;
    this.jobs = options.jobs;
    this.limiter = options.limiter;
    this.service = options.service;
    this.settings = options.settings;
  }

  start(): void {
    if (this.loop) {
      console.warn('[SuggestionWorker] Already running');
      return;
    }
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
  }

  /**
   * Cancel the loop and wait for it to wind down.
   */
  async stop(): Promise<void> {
    if (!this.controller || !this.loop) {
      return;
    }
    this.controller.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  private async run(signal: AbortSignal): Promise<void> {
    console.log(`[SuggestionWorker] Started (model: ${this.settings.model}, interval: ${this.limiter.getIntervalMs()}ms)`);

    try {
      while (!signal.aborted) {
        let job: SuggestionJob;
        try {
          job = await this.jobs.take(signal);
        } catch (error) {
          if (error instanceof CancelledError || error instanceof QueueClosedError) {
            break;
          }
          throw error;
        }
        await this.process(job, signal);
      }
    } finally {
      this.jobs.close();
      const leftover = this.jobs.drain();
      for (const job of leftover) {
        this.answer(job, FALLBACK_DESTINATION);
      }
      console.log(`[SuggestionWorker] Stopped (${leftover.length} queued job(s) sent to ${FALLBACK_DESTINATION})`);
    }
  }

  /**
   * Resolve one job and reply to it. Never rejects.
   */
  async process(job: SuggestionJob, signal?: AbortSignal): Promise<void> {
    let destination = FALLBACK_DESTINATION;
    try {
      destination = await this.resolveDestination(job.sourcePath, signal);
    } catch (error) {
      console.error(`[SuggestionWorker] Unexpected error for ${job.sourcePath}:`, error);
    } finally {
      this.answer(job, destination);
    }
  }

  private async resolveDestination(sourcePath: string, signal?: AbortSignal): Promise<string> {
    const name = path.basename(sourcePath);

    try {
      await this.limiter.wait(signal);
    } catch (error) {
      console.warn(`[SuggestionWorker] Rate limiter error for ${name}: ${errorMessage(error)}`);
      return FALLBACK_DESTINATION;
    }

    const metadata = await describeFileMetadata(sourcePath);
    const folderSnapshot = await snapshotFolders(this.root);

    const prompt = buildSuggestionPrompt({
      instructions: this.settings.instructions,
      knowledgeBase: this.settings.knowledgeBase,
      filename: name,
      metadata,
      folderSnapshot,
      preserveStructure: this.settings.preserveStructure,
    });

    if (isDebug()) {
      console.log(`[SuggestionWorker] Prompt:\n${prompt}`);
    }

    let text: string;
    try {
      text = (await this.service.suggest(this.settings.model, prompt, signal)).trim();
    } catch (error) {
      console.warn(`[SuggestionWorker] Suggestion failed for ${name} - using fallback: ${errorMessage(error)}`);
      return FALLBACK_DESTINATION;
    }

    if (!text) {
      console.warn(`[SuggestionWorker] Empty suggestion for ${name} - using fallback`);
      return FALLBACK_DESTINATION;
    }

    return text;
  }

  private answer(job: SuggestionJob, destination: string): void {
    if (!job.reply.reply(destination)) {
      console.warn(`[SuggestionWorker] Job for ${job.sourcePath} already answered`);
    }
  }
}
