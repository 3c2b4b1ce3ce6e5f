export { runInCallContext } from "./callBoundary";
export type { CallHooks } from "./callBoundary";
export { immediateCoordinator } from "./coordinator";
export type { FieldCoordinator } from "./coordinator";
export {
  ConfigurationError,
  CyclicDependencyError,
  UnsupportedOperationError,
} from "./errors";
export { WHOLE } from "./eventBus";
export type { NotificationKey } from "./eventBus";
export {
  addDependency,
  bindField,
  createField,
  equalsField,
  flush,
  getDirtySource,
  getValue,
  isDirty,
  mapField,
  markDirty,
  offChange,
  onChange,
  removeDependency,
  setValue,
  transformField,
} from "./field";
export type { Dependencies, Field, FieldOptions, Listener } from "./field";
export { getField, registerComputed } from "./fieldFactory";
export type {
  ComputedDefinition,
  ComputedTable,
  DependencyNames,
  MemberValue,
} from "./fieldFactory";
export { isObserved, observe, subscribe, toRaw } from "./observe";
export {
  createComputed,
  createState,
  createValueField,
  getCallStack,
  setCallHooks,
  setField,
} from "./state";
export type { StateOptions } from "./state";
