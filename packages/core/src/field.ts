import isEqual from "lodash/isEqual";
import { FieldCoordinator, immediateCoordinator } from "./coordinator";
import { CyclicDependencyError, UnsupportedOperationError } from "./errors";
import { toRaw } from "./observe";

const getSymbol = Symbol("get");
const setSymbol = Symbol("set");
const sourceSymbol = Symbol("source");
const dependentsSymbol = Symbol("dependents");
const listenersSymbol = Symbol("listeners");
const coordinatorSymbol = Symbol("coordinator");

export type Listener = (source: unknown) => void;

/**
 * A unit of observable state.
 *
 * - "dirty" state = `[sourceSymbol]` is present. Its value is the provenance
 *   token passed to `markDirty`, which may itself be `undefined`.
 *
 * - "clean" state = absent `[sourceSymbol]`.
 */
export interface Field<Value> {
  /**
   * Used in error messages and derived field keys. Not required to be unique.
   */
  readonly key: string | undefined;
  /**
   * Declared value type, if any. Not checked.
   */
  readonly annotation: string | undefined;
  /**
   * Arguments are only ever passed by `bindField`.
   */
  [getSymbol](...args: unknown[]): Value;
  [setSymbol]?(value: Value, ...args: unknown[]): void;
  [sourceSymbol]?: unknown;
  /**
   * Fields that depend on this field.
   */
  [dependentsSymbol]?: Set<Field<unknown>>;
  [listenersSymbol]?: Listener | Listener[];
  [coordinatorSymbol]: FieldCoordinator;
}

export type Dependencies = Field<unknown> | readonly Field<unknown>[];

export interface FieldOptions {
  key?: string;
  annotation?: string;
  deps?: Dependencies;
  coordinator?: FieldCoordinator;
}

const isField = (deps: Dependencies): deps is Field<unknown> =>
  getSymbol in deps;

const describe = (field: Field<unknown>) =>
  field.key === undefined ? "anonymous field" : `"${field.key}"`;

/**
 * Whether `to` can be reached from `from` by following dependents.
 */
const isReachable = (
  from: Field<unknown>,
  to: Field<unknown>,
  visited = new Set<Field<unknown>>()
): boolean => {
  const dependents = from[dependentsSymbol];
  if (dependents) {
    for (const dependent of dependents) {
      if (dependent === to) {
        return true;
      }
      if (!visited.has(dependent)) {
        visited.add(dependent);
        if (isReachable(dependent, to, visited)) {
          return true;
        }
      }
    }
  }
  return false;
};

/**
 * Registers `field` as a dependent of `dependency`, so that marking
 * `dependency` dirty also marks `field` dirty.
 */
export const addDependency = (
  field: Field<unknown>,
  dependency: Field<unknown>
): void => {
  if (field === dependency || isReachable(field, dependency)) {
    throw new CyclicDependencyError(
      `Making ${describe(field)} depend on ${describe(
        dependency
      )} would create a cyclical dependency.`
    );
  }
  const dependents = dependency[dependentsSymbol];
  if (dependents) {
    dependents.add(field);
  } else {
    dependency[dependentsSymbol] = new Set([field]);
  }
};

export const removeDependency = (
  field: Field<unknown>,
  dependency: Field<unknown>
): void => {
  const dependents = dependency[dependentsSymbol];
  if (dependents) {
    dependents.delete(field);
    if (!dependents.size) {
      delete dependency[dependentsSymbol];
    }
  }
};

export const createField = <Value>(
  get: (...args: never[]) => Value,
  set?: (value: Value, ...args: never[]) => void,
  { key, annotation, deps, coordinator }: FieldOptions = {}
): Field<Value> => {
  const field: Field<Value> = {
    key,
    annotation,
    [getSymbol]: get,
    [coordinatorSymbol]: coordinator ?? immediateCoordinator,
  };
  if (set) {
    field[setSymbol] = set;
  }
  if (deps) {
    const dependencies = isField(deps) ? [deps] : deps;
    for (let i = 0; i < dependencies.length; i++) {
      addDependency(field, dependencies[i]!);
    }
  }
  return field;
};

export const getValue = <Value>(field: Field<Value>): Value =>
  field[getSymbol]();

export const setValue = <Value>(field: Field<Value>, value: Value): void => {
  const set = field[setSymbol];
  if (!set) {
    throw new UnsupportedOperationError(
      `Field ${describe(field)} cannot be set because it has no setter.`
    );
  }
  set(value);
};

export const isDirty = (field: Field<unknown>): boolean =>
  sourceSymbol in field;

export const getDirtySource = (field: Field<unknown>): unknown =>
  field[sourceSymbol];

/**
 * Marks `field` and, transitively, its dependents as dirty with the given
 * provenance, dependents first. A field that is already dirty is marked again
 * and handed to its coordinator again.
 */
export const markDirty = (field: Field<unknown>, source?: unknown): void => {
  field[sourceSymbol] = source;
  const dependents = field[dependentsSymbol];
  if (dependents) {
    for (const dependent of dependents) {
      markDirty(dependent, source);
    }
  }
  field[coordinatorSymbol].addDirty(field);
};

/**
 * Removes one subscription of `listener`.
 */
export const offChange = (field: Field<unknown>, listener: Listener): void => {
  const listeners = field[listenersSymbol];
  if (listeners === listener) {
    delete field[listenersSymbol];
  } else if (Array.isArray(listeners)) {
    const index = listeners.lastIndexOf(listener);
    if (index !== -1) {
      listeners.splice(index, 1);
      if (!listeners.length) {
        delete field[listenersSymbol];
      }
    }
  }
};

export const onChange = (
  field: Field<unknown>,
  listener: Listener
): (() => void) => {
  const listeners = field[listenersSymbol];
  if (listeners === undefined) {
    field[listenersSymbol] = listener;
  } else if (Array.isArray(listeners)) {
    listeners.push(listener);
  } else {
    field[listenersSymbol] = [listeners, listener];
  }
  let subscribed = true;
  return () => {
    if (subscribed) {
      subscribed = false;
      offChange(field, listener);
    }
  };
};

/**
 * If `field` is dirty, calls the listeners subscribed at this point with the
 * provenance token and marks the field as clean. If a listener throws, the
 * remaining listeners are not called and the field stays dirty.
 */
export const flush = (field: Field<unknown>): void => {
  if (sourceSymbol in field) {
    const source = field[sourceSymbol];
    const listeners = field[listenersSymbol];
    if (Array.isArray(listeners)) {
      const snapshot = listeners.slice();
      for (let i = 0; i < snapshot.length; i++) {
        snapshot[i]!(source);
      }
    } else if (listeners) {
      listeners(source);
    }
    delete field[sourceSymbol];
  }
};

const deriveField = <Value>(
  source: Field<unknown>,
  key: string,
  get: () => Value,
  set?: (value: Value) => void
): Field<Value> =>
  createField(get, set, {
    key,
    deps: source,
    coordinator: source[coordinatorSymbol],
  });

const describeFunction = ({ name }: { name: string }) => name || "anonymous";

/**
 * A field that projects each item of a sequence-valued field.
 */
export const mapField = <Item, Result>(
  field: Field<readonly Item[]>,
  project: (item: Item, index: number) => Result
): Field<Result[]> =>
  deriveField(
    field,
    `${String(field.key)}.map(${describeFunction(project)})`,
    () => getValue(field).map((item, index) => project(item, index))
  );

export const transformField = <Value, Result>(
  field: Field<Value>,
  transform: (value: Value) => Result
): Field<Result> =>
  deriveField(
    field,
    `${String(field.key)}.do(${describeFunction(transform)})`,
    () => transform(getValue(field))
  );

/**
 * A field that tells whether the value of `field` equals `value`. Arrays,
 * records, maps and sets are compared by contents.
 */
export const equalsField = <Value>(
  field: Field<Value>,
  value: Value
): Field<boolean> =>
  deriveField(
    field,
    `${String(field.key)}.eq(${String(value)})`,
    () => isEqual(toRaw(getValue(field)), toRaw(value))
  );

/**
 * A field whose accessor and mutator are those of `field` called with `args`
 * after their own parameters. For a computed method member, this is the
 * field of one call of the method.
 */
export const bindField = <Value>(
  field: Field<Value>,
  ...args: unknown[]
): Field<Value> =>
  deriveField(
    field,
    `${String(field.key)}(${args.map((arg) => String(arg)).join(", ")})`,
    () => field[getSymbol](...args),
    field[setSymbol] &&
      ((value: Value) => {
        field[setSymbol]?.(value, ...args);
      })
  );
