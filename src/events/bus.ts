import { errorMessage } from '../errors/index.js';
import { silentLogger } from '../log/index.js';
import type { Logger } from '../log/index.js';
import type { EventFilter, EventListener, SchedulerEvent } from './types.js';

interface Subscription {
  filter: EventFilter;
  listener: EventListener;
}

export function matchesFilter(filter: EventFilter, event: SchedulerEvent): boolean {
  if (filter.taskId && filter.taskId !== event.taskId) return false;
  if (filter.types && filter.types.length > 0 && !filter.types.includes(event.type)) return false;
  return true;
}

/**
 * Synchronous fan-out of scheduler events. Listeners run in publish order,
 * so events for one task reach every subscriber in the order they happened.
 */
export class EventBus {
  private readonly subscriptions = new Set<Subscription>();

  constructor(private readonly logger: Logger = silentLogger) {}

  subscribe(filter: EventFilter, listener: EventListener): () => void {
    const sub: Subscription = { filter, listener };
    this.subscriptions.add(sub);
    return () => {
      this.subscriptions.delete(sub);
    };
  }

  publish(event: SchedulerEvent): void {
    for (const sub of this.subscriptions) {
      if (!matchesFilter(sub.filter, event)) continue;
      try {
        sub.listener(event);
      } catch (err) {
        this.logger.error(`listener for ${event.type} threw`, { taskId: event.taskId, error: errorMessage(err) });
      }
    }
  }

  get size(): number {
    return this.subscriptions.size;
  }
}
