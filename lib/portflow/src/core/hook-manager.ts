import type { UnsubscribeFn } from '../types/utils';
import { EventCallback, MIN_PUBLIC_PRIORITY, PriorityEvent } from './event';

/**
 * Map from event type to handler signature
 */
export type HandlerMap<H> = { [K in keyof H]: EventCallback };

/**
 * Hook manager keyed by event type.
 * Each event type keeps its own priority-ordered subscriber list.
 */
export class HookManager<H extends HandlerMap<H>> {
  private readonly events = new Map<keyof H, PriorityEvent<EventCallback>>();

  /**
   * Registers handler for specified event
   * @param eventType Event type
   * @param handler Event handler
   * @param priority Priority between 0 and 10, lower is called earlier
   * @returns Function to cancel registration
   */
  public on<K extends keyof H>(
    eventType: K,
    handler: H[K],
    priority = MIN_PUBLIC_PRIORITY
  ): UnsubscribeFn {
    return this.eventFor(eventType).subscribe(handler, priority);
  }

  /**
   * Registers handler that is called once, then removed
   */
  public once<K extends keyof H>(
    eventType: K,
    handler: H[K],
    priority = MIN_PUBLIC_PRIORITY
  ): UnsubscribeFn {
    return this.eventFor(eventType).subscribe(handler, priority, true);
  }

  /**
   * Registers handler ahead of all public handlers
   * @param priority Priority between -5 and -1
   */
  public onInternal<K extends keyof H>(eventType: K, handler: H[K], priority = -1): UnsubscribeFn {
    return this.eventFor(eventType).subscribeInternal(handler, priority);
  }

  /**
   * Calls all handlers for specified event
   * @param eventType Event type
   * @param args Arguments to pass to handlers
   */
  public emit<K extends keyof H>(eventType: K, ...args: Parameters<H[K]>): void {
    const event = this.events.get(eventType);

    if (!event || event.size === 0) {
      return;
    }

    event.dispatch(args);
  }

  /**
   * Cancels all subscriptions to specified event
   */
  public clearEvent(eventType: keyof H): void {
    this.events.get(eventType)?.clear();
  }

  /**
   * Cancels all subscriptions to all events
   */
  public clearAllEvents(): void {
    this.events.forEach(event => event.clear());
  }

  /**
   * Checks if there are handlers for specified event
   */
  public hasHandlers(eventType: keyof H): boolean {
    const event = this.events.get(eventType);
    return !!event && event.size > 0;
  }

  private eventFor(eventType: keyof H): PriorityEvent<EventCallback> {
    let event = this.events.get(eventType);
    if (!event) {
      event = new PriorityEvent<EventCallback>();
      this.events.set(eventType, event);
    }
    return event;
  }
}
