/**
 * ChangeNotifier - observer primitive shared by every model
 *
 * Listeners run synchronously, in registration order, before the mutating
 * call returns. A listener that throws is logged and the remaining
 * listeners still run.
 */

import { EventEmitter } from 'events';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('ChangeNotifier');

const CHANGE_EVENT = 'change';

export type ChangeListener = () => void;
export type Unsubscribe = () => void;

export class ChangeNotifier {
  private readonly emitter = new EventEmitter();
  private disposed = false;

  constructor() {
    // Models routinely have many observers (UI panes, collections, relays)
    this.emitter.setMaxListeners(0);
  }

  /**
   * Register a listener; the returned function removes it again.
   */
  subscribe(listener: ChangeListener): Unsubscribe {
    if (this.disposed) {
      throw new Error(`${this.constructor.name} was used after being disposed`);
    }

    const guarded = (): void => {
      try {
        listener();
      } catch (error) {
        logger.error(`Listener of ${this.constructor.name} threw`, error instanceof Error ? error : { error });
      }
    };

    this.emitter.on(CHANGE_EVENT, guarded);
    return () => {
      this.emitter.off(CHANGE_EVENT, guarded);
    };
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(CHANGE_EVENT);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  protected notifyListeners(): void {
    if (this.disposed) return;
    this.emitter.emit(CHANGE_EVENT);
  }

  /**
   * Drop every listener. Later notifications are ignored.
   */
  dispose(): void {
    this.emitter.removeAllListeners(CHANGE_EVENT);
    this.disposed = true;
  }
}
