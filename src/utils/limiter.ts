export type Lane = 'gemini_llm' | 'pdf_download';

export type LimiterConfig = Record<Lane, number>;

const LANES: readonly Lane[] = ['gemini_llm', 'pdf_download'];

const defaultConfig: LimiterConfig = {
  gemini_llm: 4,
  pdf_download: 3,
};

/**
 * Caps how many calls run at once per lane. Callers beyond the cap wait in
 * FIFO order for a running call to finish.
 */
export class LaneLimiter {
  private queues = new Map<Lane, Array<() => void>>();
  private running = new Map<Lane, number>();
  private config: LimiterConfig;

  constructor(config?: Partial<LimiterConfig>) {
    this.config = { ...defaultConfig, ...config };
    for (const lane of LANES) {
      this.queues.set(lane, []);
      this.running.set(lane, 0);
    }
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    await this.acquire(lane);
    try {
      return await fn();
    } finally {
      this.release(lane);
    }
  }

  activeCount(lane: Lane): number {
    return this.running.get(lane) ?? 0;
  }

  private acquire(lane: Lane): Promise<void> {
    const running = this.activeCount(lane);
    if (running < this.config[lane]) {
      this.running.set(lane, running + 1);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.queueFor(lane).push(() => {
        this.running.set(lane, this.activeCount(lane) + 1);
        resolve();
      });
    });
  }

  private release(lane: Lane): void {
    this.running.set(lane, Math.max(0, this.activeCount(lane) - 1));
    const next = this.queueFor(lane).shift();
    if (next) {
      next();
    }
  }

  private queueFor(lane: Lane): Array<() => void> {
    let queue = this.queues.get(lane);
    if (!queue) {
      queue = [];
      this.queues.set(lane, queue);
    }
    return queue;
  }
}
