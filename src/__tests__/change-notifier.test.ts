import { describe, it, expect, vi } from 'vitest';
import { ChangeNotifier } from '../core/change-notifier.js';

class Counter extends ChangeNotifier {
  value = 0;

  increment(): void {
    this.value++;
    this.notifyListeners();
  }
}

describe('ChangeNotifier', () => {
  it('should notify listeners synchronously in registration order', () => {
    const counter = new Counter();
    const calls: string[] = [];
    counter.subscribe(() => calls.push(`first:${counter.value}`));
    counter.subscribe(() => calls.push(`second:${counter.value}`));

    counter.increment();

    expect(calls).toEqual(['first:1', 'second:1']);
  });

  it('should stop notifying after unsubscribe', () => {
    const counter = new Counter();
    const listener = vi.fn();
    const unsubscribe = counter.subscribe(listener);

    counter.increment();
    unsubscribe();
    counter.increment();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(counter.listenerCount).toBe(0);
  });

  it('should keep delivering when a listener throws', () => {
    const counter = new Counter();
    const after = vi.fn();
    counter.subscribe(() => {
      throw new Error('listener failure');
    });
    counter.subscribe(after);

    expect(() => counter.increment()).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(counter.value).toBe(1);
  });

  it('should ignore notifications and reject subscriptions after dispose', () => {
    const counter = new Counter();
    const listener = vi.fn();
    counter.subscribe(listener);

    counter.dispose();
    counter.increment();

    expect(listener).not.toHaveBeenCalled();
    expect(counter.isDisposed).toBe(true);
    expect(counter.listenerCount).toBe(0);
    expect(() => counter.subscribe(vi.fn())).toThrow('Counter was used after being disposed');
  });
});
