import {
  AnyCacheEvent,
  CacheEventListener,
  CacheSubscription,
  CacheSubscriptionOptions
} from './CacheEventTypes';
import LibLogger from '../logger';

const logger = LibLogger.get('CacheEventEmitter');

interface InternalSubscription {
  id: string;
  listener: CacheEventListener;
  options: CacheSubscriptionOptions;
  isActive: boolean;
}

/**
 * Cache event emitter that manages subscriptions and event dispatching.
 * Listeners run synchronously; a throwing listener is logged and does not
 * stop delivery to the others.
 */
export class CacheEventEmitter {
  private subscriptions = new Map<string, InternalSubscription>();
  private nextSubscriptionId = 1;
  private isDestroyed = false;

  public subscribe(listener: CacheEventListener, options: CacheSubscriptionOptions = {}): CacheSubscription {
    if (this.isDestroyed) {
      throw new Error('Cannot subscribe to destroyed event emitter');
    }

    const id = `subscription_${this.nextSubscriptionId++}`;
    this.subscriptions.set(id, { id, listener, options, isActive: true });

    return {
      id,
      unsubscribe: () => {
        this.unsubscribe(id);
      },
      isActive: () => this.subscriptions.get(id)?.isActive ?? false
    };
  }

  public unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }
    subscription.isActive = false;
    this.subscriptions.delete(subscriptionId);
    return true;
  }

  /**
   * Emit an event to all matching subscriptions
   */
  public emit(event: AnyCacheEvent): void {
    if (this.isDestroyed) {
      logger.debug('Event emission skipped - emitter is destroyed', { eventType: event.type });
      return;
    }

    let emittedCount = 0;
    for (const subscription of Array.from(this.subscriptions.values())) {
      if (!subscription.isActive || !this.shouldEmitToSubscription(event, subscription)) {
        continue;
      }
      try {
        subscription.listener(event);
      } catch (error) {
        logger.error('Event listener threw', {
          subscriptionId: subscription.id,
          eventType: event.type,
          error
        });
      }
      emittedCount++;
    }

    logger.trace('Event emitted to subscriptions', { eventType: event.type, emittedCount });
  }

  public getSubscriptionCount(): number {
    return this.subscriptions.size;
  }

  public destroy(): void {
    for (const subscription of this.subscriptions.values()) {
      subscription.isActive = false;
    }
    this.subscriptions.clear();
    this.isDestroyed = true;
  }

  private shouldEmitToSubscription(event: AnyCacheEvent, subscription: InternalSubscription): boolean {
    const { eventTypes, categoryKeys } = subscription.options;

    if (eventTypes && !eventTypes.includes(event.type)) {
      return false;
    }

    if (categoryKeys && categoryKeys.length > 0) {
      if ('categoryKey' in event) {
        return categoryKeys.includes(event.categoryKey);
      }
      if (event.type === 'cache_cleared') {
        return event.scope === 'all' || event.categoryKeys.some(key => categoryKeys.includes(key));
      }
      // Access and tier events carry no category
      return false;
    }

    return true;
  }
}
