/**
 * Per-client serialization for quest mutations.
 *
 * Calls for the same client run one after another; different clients never
 * wait on each other. A failing task releases the lock for the next caller.
 */

export class ClientLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(clientId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(clientId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>(resolve => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(clientId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(clientId) === tail) {
        this.tails.delete(clientId);
      }
    }
  }

  isHeld(clientId: string): boolean {
    return this.tails.has(clientId);
  }
}
