/**
 * Disposables Utility
 *
 * Deterministic cleanup for DOM listeners and child elements owned by a widget.
 * Cleanup runs in reverse registration order (LIFO).
 */

const LOG_PREFIX = '[Disposer]';

/** Function that performs cleanup */
export type DisposeFn = () => void;

export class Disposer {
  private disposed = false;
  private readonly disposers: DisposeFn[] = [];

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Register a cleanup function.
   * If already disposed, the function runs immediately.
   */
  add(dispose: DisposeFn): void {
    if (this.disposed) {
      runSafely(dispose);
      return;
    }
    this.disposers.push(dispose);
  }

  /**
   * Add an event listener and remove it on dispose.
   */
  listen<K extends keyof HTMLElementEventMap>(
    target: HTMLElement,
    type: K,
    listener: (ev: HTMLElementEventMap[K]) => void,
    options?: boolean | AddEventListenerOptions,
  ): void {
    target.addEventListener(type, listener, options);
    this.add(() => target.removeEventListener(type, listener, options));
  }

  /**
   * Dispose all registered resources. Safe to call multiple times.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    for (let i = this.disposers.length - 1; i >= 0; i--) {
      runSafely(this.disposers[i]);
    }

    this.disposers.length = 0;
  }
}

// One failing cleanup must not stop the rest
function runSafely(dispose: DisposeFn): void {
  try {
    dispose();
  } catch (err) {
    console.warn(`${LOG_PREFIX} Cleanup failed:`, err);
  }
}
