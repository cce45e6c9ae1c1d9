export type SubscriptionCallback<T> = (value: T) => void;

/**
 * Minimal pub/sub. Subscribers are called in subscription order.
 */
export function createSubscription<T>() {
  const subscribers = new Set<SubscriptionCallback<T>>();

  return {
    subscribe: (callback: SubscriptionCallback<T>) => {
      subscribers.add(callback);
      return () => {
        subscribers.delete(callback);
      };
    },
    notify: (value: T) => {
      for (const callback of Array.from(subscribers)) {
        callback(value);
      }
    },
    size: () => subscribers.size,
    clear: () => {
      subscribers.clear();
    },
  };
}

export type Subscription<T> = ReturnType<typeof createSubscription<T>>;
