import { Field, flush } from "./field";

/**
 * Receives every field that has just been marked dirty. Decides when the
 * field gets flushed.
 */
export interface FieldCoordinator {
  addDirty: (field: Field<unknown>) => void;
}

/**
 * Flushes each dirty field synchronously, without batching or deduplication.
 */
export const immediateCoordinator: FieldCoordinator = {
  addDirty: (field) => {
    flush(field);
  },
};
