import { LoggerManager } from '../utils/logging';
import { getErrorMessage } from '../utils/errors';
import type { UnsubscribeFn } from '../types/utils';

/**
 * Any callback an event can carry
 */
export type EventCallback = (...args: never[]) => void;

interface Slot<F extends EventCallback> {
  readonly callback: F;
  readonly priority: number;
  readonly once: boolean;
}

/** Lowest priority available to user subscribers */
export const MIN_PUBLIC_PRIORITY = 0;
/** Highest priority (called last) */
export const MAX_PRIORITY = 10;
/** Lowest priority reserved for internal subscribers (called first) */
export const MIN_INTERNAL_PRIORITY = -5;

/**
 * Observer list ordered by priority. Lower priorities are called first,
 * subscribers with equal priority are called in registration order.
 *
 * Negative priorities are reserved for internal subscribers, which must
 * run before any user-defined one.
 */
export class PriorityEvent<F extends EventCallback> {
  private slots: Slot<F>[] = [];

  /**
   * Registers a callback
   * @param callback Callback to call on emit
   * @param priority Priority between 0 and 10
   * @param once Remove the callback after its first call
   * @returns Function to cancel registration
   */
  subscribe(callback: F, priority = MIN_PUBLIC_PRIORITY, once = false): UnsubscribeFn {
    if (priority < MIN_PUBLIC_PRIORITY || priority > MAX_PRIORITY) {
      throw new RangeError(
        `Priority must be between ${MIN_PUBLIC_PRIORITY} and ${MAX_PRIORITY}, got ${priority}`
      );
    }
    return this.insert(callback, priority, once);
  }

  /**
   * Registers an internal callback, called before all public ones
   * @param priority Priority between -5 and -1
   */
  subscribeInternal(callback: F, priority = -1, once = false): UnsubscribeFn {
    if (priority < MIN_INTERNAL_PRIORITY || priority >= MIN_PUBLIC_PRIORITY) {
      throw new RangeError(
        `Internal priority must be between ${MIN_INTERNAL_PRIORITY} and -1, got ${priority}`
      );
    }
    return this.insert(callback, priority, once);
  }

  unsubscribe(callback: F): boolean {
    const index = this.slots.findIndex(slot => slot.callback === callback);
    if (index === -1) {
      return false;
    }
    this.slots.splice(index, 1);
    return true;
  }

  emit(...args: Parameters<F>): void {
    this.dispatch(args);
  }

  /**
   * Calls every subscriber with the given arguments.
   * A throwing subscriber is logged and does not stop the others.
   */
  dispatch(args: readonly unknown[]): void {
    const current = this.slots;
    if (current.some(slot => slot.once)) {
      this.slots = current.filter(slot => !slot.once);
    }

    for (const slot of current) {
      try {
        Reflect.apply(slot.callback, undefined, args);
      } catch (error) {
        LoggerManager.error(
          `Error in event subscriber: ${getErrorMessage(error)}`,
          error instanceof Error ? error : undefined
        );
      }
    }
  }

  get size(): number {
    return this.slots.length;
  }

  clear(): void {
    this.slots = [];
  }

  private insert(callback: F, priority: number, once: boolean): UnsubscribeFn {
    if (this.slots.some(slot => slot.callback === callback)) {
      throw new Error('Callback is already subscribed to this event');
    }

    // after every slot with lower or equal priority, keeps ties in registration order
    let index = this.slots.length;
    while (index > 0 && this.slots[index - 1].priority > priority) {
      index--;
    }
    this.slots = [
      ...this.slots.slice(0, index),
      { callback, priority, once },
      ...this.slots.slice(index),
    ];

    return () => {
      this.unsubscribe(callback);
    };
  }
}
