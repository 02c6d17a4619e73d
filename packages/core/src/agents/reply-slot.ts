/**
 * Single-use reply slot: written once by the worker, read once by the dispatcher.
 */
export class ReplySlot<T> {
  private readonly promise: Promise<T>;
  private readonly resolveReply: (value: T) => void;
  private written = false;

  constructor() {
    let resolveReply: (value: T) => void = () => undefined;
    this.promise = new Promise<T>((resolve) => {
      resolveReply = resolve;
    });
    this.resolveReply = resolveReply;
  }

  /**
   * Returns false (and changes nothing) when a reply was already written.
   */
  reply(value: T): boolean {
    if (this.written) {
      return false;
    }
    this.written = true;
    this.resolveReply(value);
    return true;
  }

  hasReply(): boolean {
    return this.written;
  }

  wait(): Promise<T> {
    return this.promise;
  }
}
