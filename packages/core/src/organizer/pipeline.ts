import { BoundedQueue } from '../agents/bounded-queue';
import type { SuggestionService } from '../agents/llm-client';
import { RateLimiter } from '../agents/rate-limiter';
import { SuggestionWorker, type SuggestionJob } from '../agents/suggestion-worker';
import type { OrganizerConfig } from '../config/schema';
import {
  RootWatcher,
  type WatchErrorHandler,
  type WatchEvent,
  type WatchEventHandler,
  type WatchSource,
} from '../indexer/watcher';
import { Dispatcher, type DispatchOutcome } from './dispatcher';
import { Mover } from './mover';

export type WatchSourceFactory = (root: string, onEvent: WatchEventHandler, onError: WatchErrorHandler) => WatchSource;

export interface OrganizerPipelineOptions {
  config: OrganizerConfig;
  /** Required for suggestions; without it unmatched files go to the fallback */
  service?: SuggestionService | null;
  /** Defaults to a RootWatcher on config.root */
  createWatchSource?: WatchSourceFactory;
}

/**
 * OrganizerPipeline - one watched root with its own queue, limiter, worker and dispatcher.
 *
 * Nothing is shared between instances, so tests can run several side by side.
 */
export class OrganizerPipeline {
  readonly jobs: BoundedQueue<SuggestionJob>;
  readonly limiter: RateLimiter;
  readonly mover: Mover;
  readonly dispatcher: Dispatcher;
  private readonly worker: SuggestionWorker | null;
  private readonly watchSource: WatchSource;
  private readonly config: OrganizerConfig;

  constructor(options: OrganizerPipelineOptions) {
    const { config } = options;
    this.config = config;
    this.jobs = new BoundedQueue<SuggestionJob>(config.suggestions.queueCapacity);
    this.limiter = new RateLimiter(config.suggestions.rateLimitMs);
    this.mover = new Mover(config.root);

    const service = options.service ?? null;
    if (config.suggestions.enabled && !service) {
      console.warn('[Pipeline] Suggestions enabled but no suggestion service given; unmatched files go to the fallback');
    }

    this.worker =
      config.suggestions.enabled && service
        ? new SuggestionWorker({
            root: config.root,
            jobs: this.jobs,
            limiter: this.limiter,
            service,
            settings: {
              model: config.suggestions.model,
              instructions: config.suggestions.instructions,
              knowledgeBase: config.knowledgeBase,
              preserveStructure: config.preserveStructure,
            },
          })
        : null;

    this.dispatcher = new Dispatcher({
      root: config.root,
      rules: config.rules,
      ignore: config.ignore,
      preserveStructure: config.preserveStructure,
      settleDelayMs: config.settleDelayMs,
      mover: this.mover,
      jobs: this.worker ? this.jobs : null,
    });

    const createWatchSource = options.createWatchSource ?? defaultWatchSource;
    this.watchSource = createWatchSource(
      config.root,
      (event) => {
        void this.dispatcher.handleEvent(event);
      },
      (error) => this.dispatcher.handleWatchError(error)
    );
  }

  start(): void {
    if (this.dispatcher.isClosed()) {
      console.warn('[Pipeline] Already stopped; create a new pipeline to watch again');
      return;
    }
    this.worker?.start();
    this.watchSource.start();
    console.log(`[Pipeline] Watching ${this.config.root}`);
  }

  /**
   * Stop watching, drop events that were not classified yet, cancel the worker
   * (a job it already holds resolves to the fallback) and wait for the dispatcher to wind down.
   */
  async stop(): Promise<void> {
    this.watchSource.stop();
    this.dispatcher.close();
    await this.worker?.stop();
    await this.dispatcher.onIdle();
    console.log(`[Pipeline] Stopped`);
  }

  handleEvent(event: WatchEvent): Promise<DispatchOutcome> {
    return this.dispatcher.handleEvent(event);
  }

  onIdle(): Promise<void> {
    return this.dispatcher.onIdle();
  }

  isWatching(): boolean {
    return this.watchSource.isWatching();
  }
}

function defaultWatchSource(root: string, onEvent: WatchEventHandler, onError: WatchErrorHandler): WatchSource {
  return new RootWatcher(root, onEvent, onError);
}
