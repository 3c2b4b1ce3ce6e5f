import { ConfigurationError } from "./errors";
import {
  Field,
  addDependency,
  createField,
  markDirty,
  removeDependency,
} from "./field";
import { subscribeToBus } from "./eventBus";
import { ObservedState, getObservedState } from "./observe";

/**
 * Names of the members a computed field depends on. `null` registers a
 * computed field without dependencies.
 */
export type DependencyNames = string | readonly string[] | null;

export interface ComputedDefinition<State> {
  compute(state: State): unknown;
  deps?: DependencyNames;
  annotation?: string;
}

/**
 * Maps a computed field name to either the names it depends on, in which case
 * the member with that name is the computation (a method is called, a getter
 * is read), or to a definition with its own `compute` function.
 */
export type ComputedTable<State> = Record<
  string,
  DependencyNames | ComputedDefinition<State>
>;

/**
 * Value of the field for a member: what a method returns, or the member
 * itself.
 */
export type MemberValue<Member> = Member extends (...args: never[]) => infer Result
  ? Result
  : Member;

type Entry = DependencyNames | ComputedDefinition<object>;

const tablesByClass = new WeakMap<object, ComputedTable<object>>();
const tablesByInstance = new WeakMap<object, ComputedTable<object>>();
const fieldsByRecord = new WeakMap<object, Map<string, Field<unknown>>>();

/**
 * Registers computed fields for all instances of `type` and its
 * subclasses.
 */
export const registerComputed = <Instance extends object>(
  type: abstract new (...args: never[]) => Instance,
  table: ComputedTable<Instance>
): void => {
  tablesByClass.set(type, table);
};

export const attachComputed = <State extends object>(
  record: State,
  table: ComputedTable<State>
): void => {
  tablesByInstance.set(record, table);
};

const lookUp = (table: ComputedTable<object> | undefined, name: string) =>
  table && Object.prototype.hasOwnProperty.call(table, name)
    ? { entry: table[name] }
    : undefined;

const findEntry = (
  state: ObservedState,
  name: string
): { entry: Entry | undefined } | undefined => {
  const own = lookUp(tablesByInstance.get(state.proxy), name);
  if (own) {
    return own;
  }
  let prototype: object | null = Object.getPrototypeOf(state.raw);
  while (prototype && prototype !== Object.prototype) {
    const constructor: unknown = Reflect.get(prototype, "constructor");
    if (typeof constructor === "function") {
      const found = lookUp(tablesByClass.get(constructor), name);
      if (found) {
        return found;
      }
    }
    prototype = Object.getPrototypeOf(prototype);
  }
  return undefined;
};

const isDefinition = (
  entry: Entry | undefined
): entry is ComputedDefinition<object> =>
  entry !== null && typeof entry === "object" && "compute" in entry;

const toNames = (deps: DependencyNames | undefined): readonly string[] =>
  deps === null || deps === undefined
    ? []
    : typeof deps === "string"
    ? [deps]
    : deps;

/**
 * Computed fields created while resolving one `getField` call, and the edges
 * they added, so that a failed resolution leaves nothing behind.
 */
interface Resolution {
  names: string[];
  edges: [field: Field<unknown>, dependency: Field<unknown>][];
}

const createMemberField = (
  state: ObservedState,
  fields: Map<string, Field<unknown>>,
  name: string,
  resolution: Resolution
): Field<unknown> => {
  const { proxy } = state;
  const found = findEntry(state, name);

  if (!found) {
    if (typeof Reflect.get(proxy, name) === "function") {
      throw new ConfigurationError(
        `"${name}" is a method and is not registered as a computed field.`
      );
    }
    const field = createField(
      () => Reflect.get(proxy, name),
      (value) => {
        Reflect.set(proxy, name, value);
      },
      { key: name }
    );
    subscribeToBus(state.bus, name, () => {
      markDirty(field);
    });
    fields.set(name, field);
    return field;
  }

  const { entry } = found;
  const definition = isDefinition(entry) ? entry : undefined;
  const deps = isDefinition(entry) ? entry.deps : entry;
  const field = createField(
    definition
      ? () => definition.compute(proxy)
      : // Arguments come from `bindField`.
        (...args: unknown[]): unknown => {
          const member: unknown = Reflect.get(proxy, name);
          return typeof member === "function" ? member(...args) : member;
        },
    undefined,
    { key: name, annotation: definition?.annotation }
  );
  // Cached before resolving dependencies so that a cycle between names ends
  // up in `addDependency` instead of recursing forever.
  fields.set(name, field);
  resolution.names.push(name);
  const names = toNames(deps);
  for (let i = 0; i < names.length; i++) {
    // eslint-disable-next-line no-use-before-define
    const dependency = resolveField(state, fields, names[i]!, resolution);
    addDependency(field, dependency);
    resolution.edges.push([field, dependency]);
  }
  return field;
};

const resolveField = (
  state: ObservedState,
  fields: Map<string, Field<unknown>>,
  name: string,
  resolution: Resolution
): Field<unknown> =>
  fields.get(name) ?? createMemberField(state, fields, name, resolution);

/**
 * Returns the field for member `name` of an observed record, creating it on
 * first request. Repeated calls return the same field.
 */
export function getField<State extends object, Key extends keyof State & string>(
  record: State,
  name: Key
): Field<MemberValue<State[Key]>>;
export function getField(record: object, name: string): Field<unknown>;
export function getField(record: object, name: string): Field<unknown> {
  const state = getObservedState(record);
  if (!state || state.kind !== "record") {
    throw new TypeError("`getField` expects an observed record.");
  }
  let fields = fieldsByRecord.get(record);
  if (!fields) {
    fields = new Map();
    fieldsByRecord.set(record, fields);
  }
  const resolution: Resolution = { names: [], edges: [] };
  try {
    return resolveField(state, fields, name, resolution);
  } catch (error) {
    for (let i = 0; i < resolution.edges.length; i++) {
      const [field, dependency] = resolution.edges[i]!;
      removeDependency(field, dependency);
    }
    for (let i = 0; i < resolution.names.length; i++) {
      fields.delete(resolution.names[i]!);
    }
    throw error;
  }
}
