import { test } from "node:test";
import assert from "node:assert/strict";
import { readFile, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { dirname, join } from "node:path";

import { openTaskStore } from "../tasks.js";
import type { Task } from "../types.js";
import { captureLogger, fixedClock, tempFile } from "./helpers.js";

const T = fixedClock();

function task(id: number, status: Task["status"] = "pending"): Task {
  return status === "completed"
    ? { id, text: `task ${id}`, status, created_at: T, completed_at: T }
    : { id, text: `task ${id}`, status, created_at: T };
}

test("missing file starts empty without writing", async () => {
  const filePath = await tempFile("missing");
  const { logger, records } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  assert.deepEqual(store.list(), []);
  assert.equal(store.nextId(), 1);
  assert.equal(existsSync(filePath), false);
  assert(records.some((r) => r.level === 30 && r.msg === "no task file yet; starting with an empty task list"));
});

test("add assigns increasing ids that survive deletes", async () => {
  const filePath = await tempFile("ids");
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  const a = await store.add("write report");
  const b = await store.add("");
  const c = await store.add("ship it");
  assert.deepEqual([a.id, b.id, c.id], [1, 2, 3]);
  assert.equal(b.text, "");

  assert.equal(await store.remove(3), true);
  const d = await store.add("after delete");
  assert.equal(d.id, 4);
  assert.deepEqual(store.list().map((t) => t.id), [1, 2, 4]);
});

test("every mutation rewrites the task file", async () => {
  const filePath = await tempFile("persist");
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  await store.add("buy milk");
  await store.complete(1);

  const saved = JSON.parse(await readFile(filePath, "utf8"));
  assert.deepEqual(saved, {
    tasks: [{ id: 1, text: "buy milk", status: "completed", created_at: T, completed_at: T }],
    task_id_counter: 2
  });
});

test("reloading a saved store reproduces tasks and counter", async () => {
  const filePath = await tempFile("roundtrip");
  const { logger } = captureLogger();
  const first = await openTaskStore({ filePath, logger, now: fixedClock });
  await first.add("one");
  await first.add("two");
  await first.add("three");
  await first.complete(2);
  await first.remove(3);

  const second = await openTaskStore({ filePath, logger, now: fixedClock });
  assert.deepEqual(second.list(), first.list());
  assert.equal(second.nextId(), 4);
});

test("unknown ids are reported and leave the file alone", async () => {
  const filePath = await tempFile("notfound");
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  assert.equal(await store.complete(99), null);
  assert.equal(await store.remove(99), false);
  assert.equal(existsSync(filePath), false);

  await store.add("only task");
  const before = await readFile(filePath, "utf8");
  assert.equal(await store.complete(99), null);
  assert.equal(await readFile(filePath, "utf8"), before);
});

test("deleted tasks cannot be completed", async () => {
  const filePath = await tempFile("delete-complete");
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });
  await store.add("temp");

  assert.equal(await store.remove(1), true);
  assert.equal(await store.complete(1), null);
  assert.equal(await store.remove(1), false);
});

test("complete touches the first duplicate, remove drops them all", async () => {
  const filePath = await tempFile("dupes");
  await writeFile(filePath, JSON.stringify({ tasks: [task(3), task(3)], task_id_counter: 4 }));
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  await store.complete(3);
  assert.deepEqual(store.list().map((t) => t.status), ["completed", "pending"]);

  assert.equal(await store.remove(3), true);
  assert.deepEqual(store.list(), []);
});

test("counts split pending and completed", async () => {
  const filePath = await tempFile("counts");
  await writeFile(filePath, JSON.stringify({ tasks: [task(1), task(2, "completed")], task_id_counter: 3 }));
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger });

  assert.deepEqual(store.counts(), { total: 2, pending: 1, completed: 1 });
});

test("corrupt file resets to an empty list with a warning", async () => {
  const filePath = await tempFile("corrupt");
  await writeFile(filePath, "{ not json");
  const { logger, records } = captureLogger();
  const store = await openTaskStore({ filePath, logger });

  assert.deepEqual(store.list(), []);
  assert.equal(store.nextId(), 1);
  const warning = records.find((r) => r.level === 40);
  assert.equal(warning?.msg, "task file unreadable; starting with an empty task list");
  assert.equal(warning?.file, filePath);
});

test("file with the wrong shape resets with a warning", async () => {
  const filePath = await tempFile("shape");
  await writeFile(filePath, JSON.stringify({ tasks: [{ id: "x" }], task_id_counter: 7 }));
  const { logger, records } = captureLogger();
  const store = await openTaskStore({ filePath, logger });

  assert.deepEqual(store.list(), []);
  assert.equal(store.nextId(), 1);
  assert.equal(records.find((r) => r.level === 40)?.msg, "task file is malformed; starting with an empty task list");
});

test("missing document fields take their defaults", async () => {
  const filePath = await tempFile("defaults");
  await writeFile(filePath, "{}");
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger });

  assert.deepEqual(store.list(), []);
  assert.equal(store.nextId(), 1);
});

test("a counter behind stored ids is advanced", async () => {
  const filePath = await tempFile("counter");
  await writeFile(filePath, JSON.stringify({ tasks: [task(5)], task_id_counter: 2 }));
  const { logger, records } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  assert.equal(store.nextId(), 6);
  assert.equal((await store.add("next")).id, 6);
  assert.equal(records.find((r) => r.level === 40)?.msg, "task id counter behind stored ids; advancing it");
});

test("write failures are logged, not thrown", async () => {
  const dir = dirname(await tempFile("unwritable"));
  const filePath = join(dir, "no-such-dir", "tasks.json");
  const { logger, records } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  const added = await store.add("still works");
  assert.equal(added.id, 1);
  assert.equal(store.list().length, 1);
  const failure = records.find((r) => r.level === 50);
  assert.equal(failure?.msg, "failed to save tasks");
});

test("concurrent adds get distinct ids and all reach the file", async () => {
  const filePath = await tempFile("concurrent");
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  const added = await Promise.all(["a", "b", "c", "d", "e"].map((text) => store.add(text)));
  await store.flush();

  assert.deepEqual(added.map((t) => t.id).sort(), [1, 2, 3, 4, 5]);
  const saved = JSON.parse(await readFile(filePath, "utf8"));
  assert.equal(saved.tasks.length, 5);
  assert.equal(saved.task_id_counter, 6);
});

test("returned tasks are snapshots", async () => {
  const filePath = await tempFile("snapshot");
  const { logger } = captureLogger();
  const store = await openTaskStore({ filePath, logger, now: fixedClock });

  const added = await store.add("original");
  const listed = store.list();
  await store.complete(added.id);

  assert.equal(added.status, "pending");
  assert.equal(listed[0].status, "pending");
  assert.equal(store.list()[0].status, "completed");
});
