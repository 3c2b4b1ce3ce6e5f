import { readLog } from "@1log/jest";
import { WHOLE } from "./eventBus";
import { isObserved, observe, subscribe, toRaw } from "./observe";
import { log } from "./setupTests";

test("record: writes and deletes notify the member key, then WHOLE", () => {
  const state = observe<{ count?: number; _cache: number }>({
    count: 1,
    _cache: 0,
  });
  subscribe(state, "count", () => log("count"));
  subscribe(state, WHOLE, () => log("whole"));
  state.count = 2;
  expect(readLog()).toMatchInlineSnapshot(`
    > "count"
    > "whole"
  `);
  expect(state.count).toBe(2);
  delete state.count;
  expect(readLog()).toMatchInlineSnapshot(`
    > "count"
    > "whole"
  `);
  expect("count" in state).toBe(false);
  // Members starting with an underscore are not observed.
  state._cache = 1;
  expect(readLog()).toMatchInlineSnapshot(`[Empty log]`);
});

test("unsubscribing from notifications", () => {
  const state = observe({ count: 1 });
  const unsubscribe = subscribe(state, "count", () => log("count"));
  unsubscribe();
  state.count = 2;
  expect(readLog()).toMatchInlineSnapshot(`[Empty log]`);
});

test("nested composite values are wrapped, others are not", () => {
  const raw = {
    name: "cart",
    createdAt: new Date(0),
    user: { id: 1 },
    items: [{ sku: "a" }],
    prices: new Map([["a", { amount: 1 }]]),
    tags: new Set<string>(),
    nothing: null,
  };
  const state = observe(raw);
  expect(isObserved(state)).toBe(true);
  expect(toRaw(state)).toBe(raw);
  expect(isObserved(state.user)).toBe(true);
  expect(isObserved(state.items)).toBe(true);
  expect(isObserved(state.items[0])).toBe(true);
  expect(isObserved(state.prices)).toBe(true);
  expect(isObserved(state.prices.get("a"))).toBe(true);
  expect(isObserved(state.tags)).toBe(true);
  expect(isObserved(state.createdAt)).toBe(false);
  expect(state.createdAt.getTime()).toBe(0);
  expect(state.name).toBe("cart");
  expect(state.nothing).toBe(null);
  // The raw value holds the wrappers.
  expect(raw.user).toBe(state.user);
});

test("values that are already observed or never wrapped pass through", () => {
  const date = new Date(0);
  expect(observe(date)).toBe(date);
  expect(isObserved(date)).toBe(false);
  const state = observe<{ child: { value: number }; copy?: { value: number } }>(
    { child: { value: 1 } }
  );
  expect(observe(state)).toBe(state);
  state.copy = state.child;
  expect(state.copy).toBe(state.child);
  expect(toRaw(5)).toBe(5);
});

test("mutating a deeply nested sequence bubbles up to the root", () => {
  const state = observe({ groups: [{ items: [1, 2] }] });
  subscribe(state, "groups", () => log("groups"));
  subscribe(state, WHOLE, () => log("whole"));
  state.groups[0]?.items.push(3);
  expect(readLog()).toMatchInlineSnapshot(`
    > "groups"
    > "whole"
  `);
  expect(state.groups[0]?.items).toEqual([1, 2, 3]);
});

test("a replaced child no longer notifies its old parent", () => {
  const state = observe({ items: [1] });
  subscribe(state, "items", () => log("items"));
  const oldItems = state.items;
  state.items = [2];
  expect(readLog()).toMatchInlineSnapshot(`> "items"`);
  oldItems.push(5);
  expect(readLog()).toMatchInlineSnapshot(`[Empty log]`);
  state.items.push(3);
  expect(readLog()).toMatchInlineSnapshot(`> "items"`);
});

test("a wrapper assigned into another slot forwards its changes from there", () => {
  const state = observe<{
    items: { n: number }[];
    first?: { n: number };
  }>({ items: [{ n: 1 }, { n: 2 }] });
  subscribe(state, "items", () => log("items"));
  subscribe(state, "first", () => log("first"));
  state.items = state.items.filter((item) => item.n > 1);
  expect(readLog()).toMatchInlineSnapshot(`> "items"`);
  const [second] = state.items;
  if (!second) {
    throw new Error("Expected an item.");
  }
  second.n = 3;
  expect(readLog()).toMatchInlineSnapshot(`> "items"`);
  state.first = second;
  expect(readLog()).toMatchInlineSnapshot(`> "first"`);
  second.n = 4;
  expect(readLog()).toMatchInlineSnapshot(`
    > "items"
    > "first"
  `);
  state.items.splice(0, 1);
  expect(readLog()).toMatchInlineSnapshot(`> "items"`);
  second.n = 5;
  expect(readLog()).toMatchInlineSnapshot(`> "first"`);
});

test("a copy made with slice forwards changes of the shared items", () => {
  const state = observe({ items: [{ n: 1 }, { n: 2 }], copy: [{ n: 0 }] });
  subscribe(state, "items", () => log("items"));
  subscribe(state, "copy", () => log("copy"));
  state.copy = state.items.slice(1);
  expect(readLog()).toMatchInlineSnapshot(`> "copy"`);
  const [shared] = state.copy;
  if (!shared) {
    throw new Error("Expected an item.");
  }
  shared.n = 20;
  expect(readLog()).toMatchInlineSnapshot(`
    > "items"
    > "copy"
  `);
  expect(state.items[1]?.n).toBe(20);
});

test("an item moved between sequences with splice and push", () => {
  interface Task {
    done: boolean;
  }
  const state = observe<{ todo: Task[]; finished: Task[] }>({
    todo: [{ done: false }],
    finished: [],
  });
  subscribe(state, "todo", () => log("todo"));
  subscribe(state, "finished", () => log("finished"));
  const [task] = state.todo.splice(0, 1);
  if (!task) {
    throw new Error("Expected a task.");
  }
  state.finished.push(task);
  expect(readLog()).toMatchInlineSnapshot(`
    > "todo"
    > "finished"
  `);
  task.done = true;
  expect(readLog()).toMatchInlineSnapshot(`> "finished"`);
});

test("a record that holds itself does not forward forever", () => {
  const state = observe<{ count: number; self?: object }>({ count: 0 });
  subscribe(state, WHOLE, () => log("whole"));
  state.self = state;
  expect(readLog()).toMatchInlineSnapshot(`> "whole"`);
  state.count = 1;
  expect(readLog()).toMatchInlineSnapshot(`> "whole"`);
});

test("sequence: each mutation notifies once", () => {
  const list = observe([3, 1, 2]);
  subscribe(list, WHOLE, () => log("change"));
  list.push(4, 5);
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect(list.sort()).toBe(list);
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  list[0] = 9;
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect(list.pop()).toBe(5);
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  list.length = 1;
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect([...list]).toEqual([9]);
  // Reading does not notify.
  expect(list.map((item) => item * 2)).toEqual([18]);
  expect(list.includes(9)).toBe(true);
  expect(readLog()).toMatchInlineSnapshot(`[Empty log]`);
});

test("sequence: deleting an index notifies", () => {
  const list = observe([1, 2, 3]);
  subscribe(list, WHOLE, () => log("change"));
  delete list[1];
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect(list.length).toBe(3);
  expect(1 in list).toBe(false);
  expect(list[2]).toBe(3);
});

test("sequence: inserted records are wrapped and forward their changes", () => {
  const list = observe<{ n: number }[]>([]);
  subscribe(list, WHOLE, () => log("change"));
  list.splice(0, 0, { n: 1 }, { n: 2 });
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect(isObserved(list[0])).toBe(true);
  for (const item of list) {
    item.n += 10;
  }
  expect(readLog()).toMatchInlineSnapshot(`
    > "change"
    > "change"
  `);
  expect(list.map((item) => item.n)).toEqual([11, 12]);
});

test("map: mutations notify, reads do not", () => {
  const map = observe(new Map<string, { total: number }>());
  subscribe(map, WHOLE, () => log("change"));
  expect(map.set("a", { total: 1 })).toBe(map);
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect(map.size).toBe(1);
  expect(map.has("a")).toBe(true);
  const entry = map.get("a");
  expect(isObserved(entry)).toBe(true);
  if (entry) {
    entry.total = 2;
  }
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect(map.delete("missing")).toBe(false);
  expect(readLog()).toMatchInlineSnapshot(`[Empty log]`);
  expect(map.delete("a")).toBe(true);
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  // Clearing an empty map changes nothing.
  map.clear();
  expect(readLog()).toMatchInlineSnapshot(`[Empty log]`);
  expect([...map.keys()]).toEqual([]);
});

test("set: added values are wrapped and forward their changes", () => {
  const set = observe(new Set<number[]>());
  subscribe(set, WHOLE, () => log("change"));
  set.add([1]);
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  const [first] = set;
  expect(isObserved(first)).toBe(true);
  first?.push(2);
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  set.clear();
  expect(readLog()).toMatchInlineSnapshot(`> "change"`);
  expect(set.size).toBe(0);
});

test("record methods run with the wrapper as `this`", () => {
  class Counter {
    count = 0;

    increment() {
      this.count += 1;
      return this.count;
    }
  }
  const counter = observe(new Counter());
  subscribe(counter, "count", () => log("count"));
  expect(counter.increment()).toBe(1);
  expect(readLog()).toMatchInlineSnapshot(`> "count"`);
  expect(counter.increment).toBe(counter.increment);
  expect(counter instanceof Counter).toBe(true);
});

test("subscribing to a value that is not observed", () => {
  expect(() => subscribe({}, WHOLE, () => undefined)).toThrow(
    "Only observed values can be subscribed to."
  );
});
