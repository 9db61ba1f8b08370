export type Lane = 'summarize' | 'render' | 'arxiv';

export type LaneConfig<L extends string> = Record<L, number>;

export class LaneLimiter<L extends string> {
  private queues = new Map<L, Array<() => void>>();
  private running = new Map<L, number>();
  private config: LaneConfig<L>;

  constructor(config: LaneConfig<L>) {
    this.config = { ...config };
    for (const lane of Object.keys(config) as L[]) {
      this.queues.set(lane, []);
      this.running.set(lane, 0);
    }
  }

  limit<T>(lane: L, fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const task = (): void => {
        this.running.set(lane, (this.running.get(lane) ?? 0) + 1);
        Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => {
            this.running.set(lane, (this.running.get(lane) ?? 1) - 1);
            this.processQueue(lane);
          });
      };

      const queue = this.queues.get(lane);
      if (!queue) {
        reject(new Error(`Unknown limiter lane: ${lane}`));
        return;
      }
      queue.push(task);
      this.processQueue(lane);
    });
  }

  setLimits(limits: Partial<LaneConfig<L>>): void {
    for (const lane of Object.keys(limits) as L[]) {
      const max = limits[lane];
      if (max !== undefined && this.queues.has(lane)) {
        this.config[lane] = max;
        this.processQueue(lane);
      }
    }
  }

  getLimit(lane: L): number {
    return this.config[lane];
  }

  private processQueue(lane: L): void {
    const queue = this.queues.get(lane);
    const max = Math.max(1, this.config[lane]);
    while (queue && queue.length > 0 && (this.running.get(lane) ?? 0) < max) {
      const next = queue.shift();
      next?.();
    }
  }
}

export const DEFAULT_LANE_LIMITS: LaneConfig<Lane> = {
  summarize: 1,
  render: 4,
  arxiv: 3,
};

const globalLimiter = new LaneLimiter<Lane>(DEFAULT_LANE_LIMITS);

/** Applies lane limits from settings; lanes not named keep their current limit. */
export function configureLimits(limits: Partial<LaneConfig<Lane>>): void {
  globalLimiter.setLimits(limits);
}

export function laneLimit(lane: Lane): number {
  return globalLimiter.getLimit(lane);
}

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return globalLimiter.limit(lane, fn);
}
