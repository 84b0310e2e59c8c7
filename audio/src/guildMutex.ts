// Per-key mutex used to serialize session and registry mutations.
// A Map<key, Promise> acts as a chain: each run() appends to the end of the
// key's chain, so tasks for one key execute FIFO while other keys proceed.

export type GuildMutexTask<T> = () => Promise<T> | T;

export class GuildMutex {
  private chains = new Map<string, Promise<unknown>>();

  async run<T>(key: string, task: GuildMutexTask<T>): Promise<T> {
    const prev = this.chains.get(key) || Promise.resolve();

    let release: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });

    const chainPromise = prev.then(() => done);
    this.chains.set(key, chainPromise);

    try {
      await prev;
      return await task();
    } finally {
      release();

      // Drop the chain if nothing queued behind us
      if (this.chains.get(key) === chainPromise) {
        this.chains.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.chains.has(key);
  }

  get size(): number {
    return this.chains.size;
  }
}

export const guildMutex = new GuildMutex();
