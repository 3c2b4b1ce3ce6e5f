import { runInstrumentedCall } from "./callBoundary";
import {
  EventBus,
  NotificationKey,
  WHOLE,
  createEventBus,
  emit,
  subscribeToBus,
} from "./eventBus";

export type ObservedKind = "record" | "sequence" | "collection";

type Method = (...args: unknown[]) => unknown;

export interface ObservedState {
  readonly kind: ObservedKind;
  /**
   * The underlying value. Its members hold wrappers, not raw values.
   */
  readonly raw: object;
  readonly proxy: object;
  /**
   * Wrapper of the topmost observed ancestor. A root points to itself.
   */
  readonly root: object;
  readonly bus: EventBus;
  /**
   * Functions handed out by the `get` trap, keyed by the original function
   * or, for sequences and collections, by method name.
   */
  readonly methods: Map<unknown, Method>;
  /**
   * Wrappers this value was assigned into, with the slots it was assigned to.
   * Slots that no longer hold the value are dropped when it next changes.
   */
  readonly parents: Map<ObservedState, Set<NotificationKey>>;
}

const states = new WeakMap<object, ObservedState>();

export const getObservedState = (value: unknown): ObservedState | undefined =>
  typeof value === "object" && value !== null ? states.get(value) : undefined;

export const isObserved = (value: unknown): boolean =>
  getObservedState(value) !== undefined;

export const toRaw = (value: unknown): unknown =>
  getObservedState(value)?.raw ?? value;

/**
 * Objects that are stored as they are, like primitives.
 */
const isPassThrough = (value: object) =>
  value instanceof Date ||
  value instanceof RegExp ||
  value instanceof ArrayBuffer ||
  ArrayBuffer.isView(value) ||
  value instanceof Promise ||
  value instanceof WeakMap ||
  value instanceof WeakSet ||
  value instanceof Error;

/**
 * Emits `key` and, for a member key, also `WHOLE` so that the parent hears
 * about the change.
 */
const notify = (state: ObservedState, key: NotificationKey) => {
  emit(state.bus, key);
  if (key !== WHOLE) {
    emit(state.bus, WHOLE);
  }
};

const getMethod = (state: ObservedState, key: unknown, create: () => Method) => {
  let method = state.methods.get(key);
  if (!method) {
    method = create();
    state.methods.set(key, method);
  }
  return method;
};

/**
 * Whether `parent` still holds `child` in the slot it was assigned to.
 */
const holds = (parent: ObservedState, child: object, key: NotificationKey) => {
  const { raw } = parent;
  if (Array.isArray(raw)) {
    return raw.includes(child);
  }
  if (raw instanceof Map) {
    for (const value of raw.values()) {
      if (value === child) {
        return true;
      }
    }
    return false;
  }
  if (raw instanceof Set) {
    return raw.has(child);
  }
  return key !== WHOLE && Reflect.get(raw, key) === child;
};

const forwarding = new Set<ObservedState>();

/**
 * Re-emits a change of `child` on every parent slot that still holds it.
 */
const forward = (child: ObservedState) => {
  // A value that contains itself would otherwise forward forever.
  if (forwarding.has(child)) {
    return;
  }
  forwarding.add(child);
  try {
    for (const [parent, keys] of [...child.parents]) {
      for (const key of [...keys]) {
        if (holds(parent, child.proxy, key)) {
          notify(parent, key);
        } else {
          keys.delete(key);
        }
      }
      if (!keys.size) {
        child.parents.delete(parent);
      }
    }
  } finally {
    forwarding.delete(child);
  }
};

const register = (
  kind: ObservedKind,
  raw: object,
  proxy: object,
  root: object | undefined
): ObservedState => {
  const state: ObservedState = {
    kind,
    raw,
    proxy,
    root: root ?? proxy,
    bus: createEventBus(),
    methods: new Map(),
    parents: new Map(),
  };
  states.set(proxy, state);
  subscribeToBus(state.bus, WHOLE, () => {
    forward(state);
  });
  return state;
};

const wrapValue = (
  value: unknown,
  parent: ObservedState,
  key: NotificationKey
): unknown => {
  if (typeof value !== "object" || value === null || isPassThrough(value)) {
    return value;
  }
  // An existing wrapper keeps its root and gains one more parent slot.
  const wrapper = states.has(value)
    ? value
    : // eslint-disable-next-line no-use-before-define
      createWrapper(value, parent.root);
  const child = states.get(wrapper);
  if (child && child !== parent) {
    const keys = child.parents.get(parent);
    if (keys) {
      keys.add(key);
    } else {
      child.parents.set(parent, new Set([key]));
    }
  }
  return wrapper;
};

const isObservedMember = (key: string | symbol): key is string =>
  typeof key === "string" && !key.startsWith("_");

const observeRecord = <T extends object>(
  raw: T,
  root: object | undefined
): T => {
  const proxy = new Proxy(raw, {
    get: (target, key, receiver) => {
      const value: unknown = Reflect.get(target, key, receiver);
      if (
        typeof value !== "function" ||
        !isObservedMember(key) ||
        key in Object.prototype
      ) {
        return value;
      }
      const name = key;
      return getMethod(
        state,
        value,
        () =>
          (...args) =>
            runInstrumentedCall(state.root, name, (): unknown =>
              value.apply(proxy, args)
            )
      );
    },
    set: (target, key, value) => {
      if (!isObservedMember(key)) {
        return Reflect.set(target, key, value);
      }
      const succeeded = Reflect.set(target, key, wrapValue(value, state, key));
      notify(state, key);
      return succeeded;
    },
    deleteProperty: (target, key) => {
      if (!isObservedMember(key) || !(key in target)) {
        return Reflect.deleteProperty(target, key);
      }
      const succeeded = Reflect.deleteProperty(target, key);
      notify(state, key);
      return succeeded;
    },
  });
  const state = register("record", raw, proxy, root);
  const keys = Object.keys(raw);
  for (let i = 0; i < keys.length; i++) {
    const key = keys[i]!;
    if (isObservedMember(key)) {
      const value: unknown = Reflect.get(raw, key);
      const wrapped = wrapValue(value, state, key);
      if (wrapped !== value) {
        Reflect.set(raw, key, wrapped);
      }
    }
  }
  return proxy;
};

type SequenceMutator =
  | "push"
  | "pop"
  | "shift"
  | "unshift"
  | "splice"
  | "sort"
  | "reverse"
  | "fill"
  | "copyWithin";

const sequenceMutators: ReadonlySet<string> = new Set<SequenceMutator>([
  "push",
  "pop",
  "shift",
  "unshift",
  "splice",
  "sort",
  "reverse",
  "fill",
  "copyWithin",
]);

const isSequenceMutator = (key: string | symbol): key is SequenceMutator =>
  typeof key === "string" && sequenceMutators.has(key);

/**
 * Range of arguments that a mutator inserts into the array.
 */
const getInsertedRange = (
  name: SequenceMutator,
  argumentCount: number
): [number, number] => {
  switch (name) {
    case "push":
    case "unshift":
      return [0, argumentCount];
    case "splice":
      return [2, argumentCount];
    case "fill":
      return [0, 1];
    default:
      return [0, 0];
  }
};

const isIndex = (key: string | symbol): boolean =>
  typeof key === "string" && /^(0|[1-9]\d*)$/.test(key);

const observeSequence = <T extends unknown[]>(
  raw: T,
  root: object | undefined
): T => {
  const proxy = new Proxy(raw, {
    get: (target, key, receiver) => {
      if (!isSequenceMutator(key)) {
        return Reflect.get(target, key, receiver);
      }
      const name = key;
      return getMethod(state, name, () => (...args) => {
        const [start, end] = getInsertedRange(name, args.length);
        for (let i = start; i < end; i++) {
          args[i] = wrapValue(args[i], state, WHOLE);
        }
        const result: unknown = Reflect.apply(
          Array.prototype[name],
          target,
          args
        );
        notify(state, WHOLE);
        return result === target ? proxy : result;
      });
    },
    set: (target, key, value) => {
      if (isIndex(key)) {
        const succeeded = Reflect.set(
          target,
          key,
          wrapValue(value, state, WHOLE)
        );
        notify(state, WHOLE);
        return succeeded;
      }
      const succeeded = Reflect.set(target, key, value);
      if (key === "length") {
        notify(state, WHOLE);
      }
      return succeeded;
    },
    deleteProperty: (target, key) => {
      const succeeded = Reflect.deleteProperty(target, key);
      if (isIndex(key)) {
        notify(state, WHOLE);
      }
      return succeeded;
    },
  });
  const state = register("sequence", raw, proxy, root);
  const items: unknown[] = raw;
  for (let i = 0; i < items.length; i++) {
    items[i] = wrapValue(items[i], state, WHOLE);
  }
  return proxy;
};

const observeCollection = <T extends Map<unknown, unknown> | Set<unknown>>(
  raw: T,
  root: object | undefined
): T => {
  const map: Map<unknown, unknown> | undefined =
    raw instanceof Map ? raw : undefined;
  const set: Set<unknown> | undefined = raw instanceof Set ? raw : undefined;

  const createMutator = (key: string | symbol): Method | undefined => {
    if (key === "set" && map) {
      return (entryKey, value) => {
        map.set(entryKey, wrapValue(value, state, WHOLE));
        notify(state, WHOLE);
        return proxy;
      };
    }
    if (key === "add" && set) {
      return (value) => {
        set.add(wrapValue(value, state, WHOLE));
        notify(state, WHOLE);
        return proxy;
      };
    }
    if (key === "delete") {
      return (entryKey) => {
        const deleted = raw.delete(entryKey);
        if (deleted) {
          notify(state, WHOLE);
        }
        return deleted;
      };
    }
    if (key === "clear") {
      return () => {
        if (raw.size) {
          raw.clear();
          notify(state, WHOLE);
        }
      };
    }
    return undefined;
  };

  const proxy = new Proxy(raw, {
    get: (target, key) => {
      const cached = state.methods.get(key);
      if (cached) {
        return cached;
      }
      const value: unknown = Reflect.get(target, key, target);
      if (typeof value !== "function") {
        return value;
      }
      // Map and Set methods only work with the raw value as the receiver.
      const method: Method = createMutator(key) ?? value.bind(target);
      state.methods.set(key, method);
      return method;
    },
  });
  const state = register("collection", raw, proxy, root);
  if (map) {
    for (const [key, value] of map) {
      map.set(key, wrapValue(value, state, WHOLE));
    }
  }
  if (set) {
    const values = [...set];
    set.clear();
    for (let i = 0; i < values.length; i++) {
      set.add(wrapValue(values[i], state, WHOLE));
    }
  }
  return proxy;
};

const createWrapper = <T extends object>(
  value: T,
  root: object | undefined
): T => {
  if (Array.isArray(value)) {
    return observeSequence(value, root);
  }
  if (value instanceof Map || value instanceof Set) {
    return observeCollection(value, root);
  }
  return observeRecord(value, root);
};

/**
 * Wraps `value` as the root of an observed object graph. Nested records,
 * arrays, maps and sets are wrapped too. Returns `value` itself if it is
 * already observed or is a value that is never wrapped, like a `Date`.
 */
export const observe = <T extends object>(value: T): T =>
  states.has(value) || isPassThrough(value)
    ? value
    : createWrapper(value, undefined);

/**
 * Subscribes to notifications of an observed value: `key` is a member name
 * of a record, or `WHOLE` for any change. Returns an unsubscribe function.
 */
export const subscribe = (
  wrapper: object,
  key: NotificationKey,
  callback: () => void
): (() => void) => {
  const state = states.get(wrapper);
  if (!state) {
    throw new TypeError("Only observed values can be subscribed to.");
  }
  return subscribeToBus(state.bus, key, callback);
};
