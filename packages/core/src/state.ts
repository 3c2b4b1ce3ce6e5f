import { CallHooks, getRootCallStack, setRootCallHooks } from "./callBoundary";
import {
  Dependencies,
  Field,
  FieldOptions,
  createField,
  markDirty,
  setValue,
} from "./field";
import { ComputedTable, attachComputed } from "./fieldFactory";
import { getObservedState, observe } from "./observe";

export interface StateOptions<State> extends CallHooks {
  computed?: ComputedTable<State>;
}

const getRoot = (wrapper: object) => {
  const state = getObservedState(wrapper);
  if (!state) {
    throw new TypeError("Expected an observed value.");
  }
  return state.root;
};

/**
 * Sets the hooks that bracket the outermost instrumented call on the object
 * graph that `wrapper` belongs to.
 */
export const setCallHooks = (wrapper: object, hooks: CallHooks): void => {
  setRootCallHooks(getRoot(wrapper), hooks);
};

/**
 * Names of the instrumented calls that are running on the object graph that
 * `wrapper` belongs to, outermost first.
 */
export const getCallStack = (wrapper: object): string[] =>
  getRootCallStack(getRoot(wrapper));

export const createState = <State extends object>(
  factory: () => State,
  { computed, onCallStart, onCallEnd }: StateOptions<State> = {}
): State => {
  const state = observe(factory());
  if (computed) {
    attachComputed(state, computed);
  }
  if (onCallStart || onCallEnd) {
    setCallHooks(state, { onCallStart, onCallEnd });
  }
  return state;
};

/**
 * A read-only field computed by `get`, marked dirty whenever one of `deps` is.
 */
export const createComputed = <Value>(
  get: () => Value,
  deps?: Dependencies,
  options: Omit<FieldOptions, "deps"> = {}
): Field<Value> =>
  createField(get, undefined, {
    key: `computed(${get.name || "anonymous"})`,
    ...options,
    deps,
  });

/**
 * A field that holds its own value. Setting it marks it dirty.
 */
export const createValueField = <Value>(
  name: string,
  value: Value,
  deps?: Dependencies,
  options: Omit<FieldOptions, "deps"> = {}
): Field<Value> => {
  let current = value;
  const field: Field<Value> = createField(
    () => current,
    (newValue: Value) => {
      current = newValue;
      markDirty(field);
    },
    { key: name, annotation: typeof value, ...options, deps }
  );
  return field;
};

/**
 * Sets the value of `field` and marks it dirty with `source` as provenance.
 */
export const setField = <Value>(
  field: Field<Value>,
  value: Value,
  source?: unknown
): void => {
  setValue(field, value);
  markDirty(field, source);
};
