/**
 * Tracks the loading of named assets during a phase.
 */

import { Progress } from '../../packages/progress-core/src/index.js';
import { Logger } from '../logging/logger.js';

export type AssetLoadState = 'loading' | 'loaded' | 'failed';

export interface AssetStatus {
  name: string;
  state: AssetLoadState;
  error?: string;
}

/**
 * Assets registered here are counted as one unit of visible progress each
 * while the owning phase is active. A failed asset counts as done so the
 * phase can still move on; the failure is logged and kept in `failures()`.
 */
export class AssetsLoading {
  private readonly assets = new Map<string, AssetStatus>();

  constructor(
    private readonly phase: string,
    private readonly logger: Logger = Logger.silent('assets'),
  ) {}

  get size(): number {
    return this.assets.size;
  }

  /**
   * Track `load` under `name`. Adding a name again replaces the earlier entry.
   */
  add(name: string, load: PromiseLike<unknown>): void {
    const status: AssetStatus = { name, state: 'loading' };
    this.assets.set(name, status);

    void Promise.resolve(load).then(
      () => {
        status.state = 'loaded';
      },
      (err: unknown) => {
        status.state = 'failed';
        status.error = err instanceof Error ? err.message : String(err);
        this.logger.warn(`Asset ${name} failed to load: ${status.error}`, { phase: this.phase });
      },
    );
  }

  /** Mark an asset as already available. */
  addLoaded(name: string): void {
    this.assets.set(name, { name, state: 'loaded' });
  }

  status(name: string): AssetStatus | undefined {
    return this.assets.get(name);
  }

  failures(): AssetStatus[] {
    return [...this.assets.values()].filter((a) => a.state === 'failed');
  }

  progress(): Progress {
    let done = 0;
    for (const asset of this.assets.values()) {
      if (asset.state !== 'loading') done++;
    }
    return new Progress(done, this.assets.size);
  }

  clear(): void {
    this.assets.clear();
  }
}
