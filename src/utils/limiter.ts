import { createLogger } from './logger';

export type Lane = 'gemini_llm' | 'gemini_ocr';

type LimiterConfig = Record<Lane, number>;

const defaultConfig: LimiterConfig = {
  gemini_llm: 2,
  gemini_ocr: 1,
};

export class LaneLimiter {
  private queues: Record<Lane, Array<() => void>> = { gemini_llm: [], gemini_ocr: [] };
  private running: Record<Lane, number> = { gemini_llm: 0, gemini_ocr: 0 };
  private config: LimiterConfig;

  constructor(config?: Partial<LimiterConfig>) {
    this.config = { ...defaultConfig, ...config };
  }

  async limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
    const max = this.config[lane];

    if (this.running[lane] < max) {
      this.running[lane] += 1;
      try {
        return await fn();
      } finally {
        this.release(lane);
      }
    }

    return new Promise<T>((resolve, reject) => {
      this.queues[lane].push(() => {
        this.running[lane] += 1;
        void fn()
          .then(resolve, reject)
          .finally(() => this.release(lane));
      });
    });
  }

  private release(lane: Lane): void {
    this.running[lane] = Math.max(0, this.running[lane] - 1);
    if (this.running[lane] < this.config[lane]) {
      const next = this.queues[lane].shift();
      if (next) next();
    }
  }
}

function laneLimit(raw: string | undefined, fallback: number): number {
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 1 ? Math.floor(parsed) : fallback;
}

const globalLimiterConfig: LimiterConfig = {
  gemini_llm: laneLimit(process.env.AI_CONCURRENCY, defaultConfig.gemini_llm),
  gemini_ocr: laneLimit(process.env.OCR_CONCURRENCY, defaultConfig.gemini_ocr),
};

const globalLimiter = new LaneLimiter(globalLimiterConfig);

createLogger('Limiter').debug('Concurrency limits', { ...globalLimiterConfig });

export function limit<T>(lane: Lane, fn: () => Promise<T>): Promise<T> {
  return globalLimiter.limit(lane, fn);
}
