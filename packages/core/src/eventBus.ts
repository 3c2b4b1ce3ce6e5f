/**
 * Notification key used when a value changed as a whole, as opposed to one
 * of its named members.
 */
export const WHOLE = Symbol("whole");

export type NotificationKey = string | typeof WHOLE;

export type EventBus = Map<NotificationKey, (() => void)[]>;

export const createEventBus = (): EventBus => new Map();

export const subscribeToBus = (
  bus: EventBus,
  key: NotificationKey,
  callback: () => void
): (() => void) => {
  const subscribers = bus.get(key);
  if (subscribers) {
    subscribers.push(callback);
  } else {
    bus.set(key, [callback]);
  }
  let subscribed = true;
  return () => {
    if (subscribed) {
      subscribed = false;
      const current = bus.get(key);
      if (current) {
        const index = current.lastIndexOf(callback);
        if (index !== -1) {
          current.splice(index, 1);
        }
        if (!current.length) {
          bus.delete(key);
        }
      }
    }
  };
};

export const emit = (bus: EventBus, key: NotificationKey): void => {
  const subscribers = bus.get(key);
  if (subscribers) {
    // Copying because a subscriber can unsubscribe itself or others.
    const snapshot = subscribers.slice();
    for (let i = 0; i < snapshot.length; i++) {
      snapshot[i]!();
    }
  }
};
