import { describe, it, expect, vi } from 'vitest';
import { EffectChannel, EffectJob } from '../campaign/EffectChannel.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('EffectChannel', () => {
  it('returns a running job immediately and reports it once it completes', async () => {
    const channel = new EffectChannel(() => 1000);
    const heard: EffectJob[] = [];
    channel.subscribe((job) => heard.push(job));
    const task = deferred<string>();

    const job = channel.dispatch('image', 'scene-001', () => task.promise);
    expect(job).toMatchObject({ id: 'image-1000-1', status: 'running', sceneId: 'scene-001' });

    task.resolve('/images/dock.png');
    await channel.drain();

    expect(heard).toEqual([expect.objectContaining({ id: 'image-1000-1', status: 'completed', result: '/images/dock.png' })]);
  });

  it('only reports the latest job per type and scene', async () => {
    const channel = new EffectChannel(() => 5);
    const listener = vi.fn();
    channel.subscribe(listener);
    const older = deferred<Uint8Array>();
    const newer = deferred<Uint8Array>();

    channel.dispatch('speech', 'scene-001', () => older.promise);
    channel.dispatch('speech', 'scene-001', () => newer.promise);
    newer.resolve(new Uint8Array([1]));
    older.resolve(new Uint8Array([2]));
    await channel.drain();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toMatchObject({ id: 'speech-5-2', status: 'completed' });
  });

  it('records failures without throwing', async () => {
    const channel = new EffectChannel(() => 7);
    const listener = vi.fn();
    channel.subscribe(listener);

    const job = channel.dispatch('image', 'scene-002', () => Promise.reject(new Error('renderer down')));
    await channel.drain();

    expect(channel.getJob(job.id)).toMatchObject({ status: 'failed', error: 'renderer down' });
    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ status: 'failed' }));
  });

  it('cancels unfinished jobs of a scene and stays quiet about them', async () => {
    const channel = new EffectChannel(() => 9);
    const listener = vi.fn();
    channel.subscribe(listener);
    const task = deferred<string>();

    const job = channel.dispatch('image', 'scene-003', () => task.promise);
    channel.cancelScene('scene-003');
    task.resolve('/images/late.png');
    await channel.drain();

    expect(channel.getJob(job.id)?.status).toBe('cancelled');
    expect(listener).not.toHaveBeenCalled();
  });

  it('keeps going when a listener throws and stops notifying after unsubscribe', async () => {
    const channel = new EffectChannel(() => 11);
    const good = vi.fn();
    channel.subscribe(() => {
      throw new Error('listener bug');
    });
    const unsubscribe = channel.subscribe(good);

    channel.dispatch('speech', 'scene-001', () => Promise.resolve(new Uint8Array()));
    await channel.drain();
    unsubscribe();
    channel.dispatch('speech', 'scene-001', () => Promise.resolve(new Uint8Array()));
    await channel.drain();

    expect(good).toHaveBeenCalledTimes(1);
  });
});
