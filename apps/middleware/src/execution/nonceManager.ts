/** Simple mutex for async operations */
export class Mutex {
  private locked = false;
  private queue: (() => void)[] = [];

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  private release(): void {
    this.locked = false;
    const next = this.queue.shift();
    if (next) next();
  }
}

/**
 * Sequential nonce counter for one signing identity.
 *
 * `withNonce` hands the current nonce to `use` inside the lock and advances the
 * counter only if `use` resolves, so a failed broadcast leaves no gap.
 */
export class NonceManager {
  private mutex = new Mutex();

  constructor(private next: number, private readonly readOnChainNonce: () => Promise<number>) {}

  current(): number {
    return this.next;
  }

  async withNonce<A>(use: (nonce: number) => Promise<A>): Promise<A> {
    const release = await this.mutex.acquire();
    try {
      const result = await use(this.next);
      this.next += 1;
      return result;
    } finally {
      release();
    }
  }

  async sync(): Promise<number> {
    const release = await this.mutex.acquire();
    try {
      this.next = await this.readOnChainNonce();
      return this.next;
    } finally {
      release();
    }
  }
}
