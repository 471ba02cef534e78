import { describe, it, expect, vi } from 'vitest';
import { AssetsLoading } from '../src/assets/assets-loading.js';
import { Logger } from '../src/logging/logger.js';

async function flush(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 0));
}

describe('AssetsLoading', () => {
  it('reports 0/0 when empty', () => {
    expect(new AssetsLoading('loading').progress().toJSON()).toEqual({ done: 0, total: 0 });
  });

  it('counts assets as they finish loading', async () => {
    const assets = new AssetsLoading('loading');
    let finish: () => void = () => {};
    assets.add('level', new Promise<void>((resolve) => { finish = resolve; }));
    assets.add('music', Promise.resolve());
    await flush();
    expect(assets.progress().toJSON()).toEqual({ done: 1, total: 2 });
    expect(assets.status('level')?.state).toBe('loading');

    finish();
    await flush();
    expect(assets.progress().toJSON()).toEqual({ done: 2, total: 2 });
  });

  it('counts failed assets as done and logs the failure', async () => {
    const logger = new Logger({ source: 'test', console: false });
    const warn = vi.spyOn(logger, 'warn');
    const assets = new AssetsLoading('loading', logger);
    assets.add('atlas', Promise.reject(new Error('404')));
    await flush();
    expect(assets.progress().toJSON()).toEqual({ done: 1, total: 1 });
    expect(assets.failures()).toEqual([{ name: 'atlas', state: 'failed', error: '404' }]);
    expect(warn).toHaveBeenCalledWith('Asset atlas failed to load: 404', { phase: 'loading' });
  });

  it('replaces an entry added under the same name', () => {
    const assets = new AssetsLoading('loading');
    assets.add('level', new Promise<void>(() => {}));
    assets.addLoaded('level');
    expect(assets.size).toBe(1);
    expect(assets.progress().toJSON()).toEqual({ done: 1, total: 1 });
  });

  it('forgets everything on clear', () => {
    const assets = new AssetsLoading('loading');
    assets.addLoaded('font');
    assets.clear();
    expect(assets.size).toBe(0);
  });
});
