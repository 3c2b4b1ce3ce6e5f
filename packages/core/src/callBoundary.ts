import { AsyncLocalStorage } from "node:async_hooks";

export interface CallHooks {
  /**
   * Called before the outermost instrumented call on an object graph starts.
   */
  onCallStart?: () => void;
  /**
   * Called after the outermost instrumented call on an object graph returns
   * or throws.
   */
  onCallEnd?: () => void;
}

/**
 * Names of the instrumented calls currently running, per root.
 */
type CallStacks = WeakMap<object, string[]>;

const callContext = new AsyncLocalStorage<CallStacks>();

/**
 * Used by code that does not run inside `runInCallContext`.
 */
const defaultCallStacks: CallStacks = new WeakMap();

const hooksByRoot = new WeakMap<object, CallHooks>();

const getCallStacks = () => callContext.getStore() ?? defaultCallStacks;

/**
 * Runs `callback` with call stacks of its own, so that instrumented calls it
 * makes, including ones made after it awaits, are bracketed independently of
 * any other call chain.
 */
export const runInCallContext = <T>(callback: () => T): T =>
  callContext.run(new WeakMap(), callback);

export const setRootCallHooks = (root: object, hooks: CallHooks): void => {
  hooksByRoot.set(root, hooks);
};

export const getRootCallStack = (root: object): string[] =>
  getCallStacks().get(root)?.slice() ?? [];

export const runInstrumentedCall = <T>(
  root: object,
  name: string,
  callback: () => T
): T => {
  const callStacks = getCallStacks();
  let stack = callStacks.get(root);
  if (!stack) {
    stack = [];
    callStacks.set(root, stack);
  }
  if (!stack.length) {
    hooksByRoot.get(root)?.onCallStart?.();
  }
  stack.push(name);
  let failed = false;
  try {
    return callback();
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    stack.pop();
    if (!stack.length) {
      if (failed) {
        // The error of the call takes precedence over that of the hook.
        try {
          hooksByRoot.get(root)?.onCallEnd?.();
        } catch (error) {
          queueMicrotask(() => {
            throw error;
          });
        }
      } else {
        hooksByRoot.get(root)?.onCallEnd?.();
      }
    }
  }
};
