import * as fs from 'fs';
import * as path from 'path';

export type WatchEventType = 'create' | 'other';

export interface WatchEvent {
  type: WatchEventType;
  path: string;
}

export type WatchEventHandler = (event: WatchEvent) => void;
export type WatchErrorHandler = (error: Error) => void;

/**
 * Anything that can feed filesystem events to the dispatcher.
 */
export interface WatchSource {
  start(): void;
  stop(): void;
  isWatching(): boolean;
}

/**
 * RootWatcher - Watches the top level of a single directory.
 *
 * Uses Node.js fs.watch without recursion: files moved into subfolders never come back
 * as events. A `rename` for a name that exists afterwards is a creation; everything else
 * is reported as `other`. Watcher errors go to the error handler and watching resumes.
 */
export class RootWatcher implements WatchSource {
  private rootPath: string;
  private onEvent: WatchEventHandler;
  private onError: WatchErrorHandler;
  private watcher: fs.FSWatcher | null = null;
  private isActive: boolean = false;

  constructor(rootPath: string, onEvent: WatchEventHandler, onError: WatchErrorHandler) {
    this.rootPath = path.resolve(rootPath);
    this.onEvent = onEvent;
    this.onError = onError;
  }

  /**
   * Start watching the root directory.
   */
  start(): void {
    if (this.isActive) {
      console.warn(`[Watcher] Already watching ${this.rootPath}`);
      return;
    }

    if (!fs.existsSync(this.rootPath)) {
      console.warn(`[Watcher] Root does not exist: ${this.rootPath}`);
      return;
    }

    if (!fs.statSync(this.rootPath).isDirectory()) {
      console.warn(`[Watcher] Root is not a directory: ${this.rootPath}`);
      return;
    }

    try {
      this.watcher = fs.watch(this.rootPath, { persistent: true }, (eventType, filename) => {
        this.handleRawEvent(eventType, filename);
      });
      this.watcher.on('error', (error) => this.handleWatchError(error));
      this.isActive = true;
      console.log(`[Watcher] Started watching ${this.rootPath}`);
    } catch (error) {
      this.watcher = null;
      this.isActive = false;
      this.onError(error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Stop watching the root directory.
   */
  stop(): void {
    if (!this.isActive) {
      return;
    }

    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }

    this.isActive = false;
    console.log(`[Watcher] Stopped watching ${this.rootPath}`);
  }

  isWatching(): boolean {
    return this.isActive;
  }

  /**
   * Normalize a raw fs.watch callback into a WatchEvent.
   */
  private handleRawEvent(eventType: string, filename: string | Buffer | null): void {
    if (!filename) {
      return;
    }

    const fullPath = path.join(this.rootPath, filename.toString());
    const type: WatchEventType = eventType === 'rename' && fs.existsSync(fullPath) ? 'create' : 'other';

    this.onEvent({ type, path: fullPath });
  }

  /**
   * An errored FSWatcher is unusable: report, then open a fresh one.
   */
  private handleWatchError(error: Error): void {
    this.onError(error);
    if (!this.isActive) {
      return;
    }
    this.watcher?.close();
    this.watcher = null;
    this.isActive = false;
    this.start();
  }
}
