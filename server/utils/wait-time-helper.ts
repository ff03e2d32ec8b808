import { sleep } from './retry';

export interface WaitTimeConfig {
  baseDelay: number;
  minVariance: number;
  maxVariance: number;
}

/**
 * Randomised pause between objects so the catalog sees a steady, human-paced stream
 */
export class WaitTimeHelper {
  private config: WaitTimeConfig;

  constructor(config: WaitTimeConfig) {
    this.config = config;
  }

  getRandomDelay(customBase?: number): number {
    const baseDelay = customBase !== undefined ? customBase : this.config.baseDelay;
    const spread = Math.max(0, this.config.maxVariance - this.config.minVariance);
    const variance = Math.random() * spread + this.config.minVariance;
    return Math.round(baseDelay + variance);
  }

  async wait(customBase?: number): Promise<void> {
    const delay = this.getRandomDelay(customBase);
    if (delay > 0) {
      await sleep(delay);
    }
  }

  static none(): WaitTimeHelper {
    return new WaitTimeHelper({ baseDelay: 0, minVariance: 0, maxVariance: 0 });
  }

  static createFromConfig(politeDelay: number, minExtra: number = 0, maxExtra: number = 500): WaitTimeHelper {
    return new WaitTimeHelper({
      baseDelay: politeDelay,
      minVariance: minExtra,
      maxVariance: maxExtra
    });
  }
}
