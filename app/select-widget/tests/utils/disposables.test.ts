/**
 * Disposer unit tests
 */
import { describe, expect, it, vi } from 'vitest';

import { Disposer } from '@/shared/utils/disposables';

describe('Disposer', () => {
  it('runs cleanups in reverse registration order', () => {
    const disposer = new Disposer();
    const calls: string[] = [];

    disposer.add(() => calls.push('first'));
    disposer.add(() => calls.push('second'));
    disposer.add(() => calls.push('third'));
    disposer.dispose();

    expect(calls).toEqual(['third', 'second', 'first']);
    expect(disposer.isDisposed).toBe(true);
  });

  it('runs each cleanup once across repeated dispose calls', () => {
    const disposer = new Disposer();
    const cleanup = vi.fn();

    disposer.add(cleanup);
    disposer.dispose();
    disposer.dispose();

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('runs cleanups added after dispose immediately', () => {
    const disposer = new Disposer();
    disposer.dispose();

    const cleanup = vi.fn();
    disposer.add(cleanup);

    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it('keeps going when a cleanup throws', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const failure = new Error('cleanup failed');
    const disposer = new Disposer();
    const after = vi.fn();
    const before = vi.fn();

    disposer.add(before);
    disposer.add(() => {
      throw failure;
    });
    disposer.add(after);
    disposer.dispose();

    expect(after).toHaveBeenCalledTimes(1);
    expect(before).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[Disposer] Cleanup failed:', failure);
  });

  it('removes listeners registered through listen', () => {
    const disposer = new Disposer();
    const button = document.createElement('button');
    const onClick = vi.fn();

    disposer.listen(button, 'click', onClick);
    button.click();
    disposer.dispose();
    button.click();

    expect(onClick).toHaveBeenCalledTimes(1);
  });
});
