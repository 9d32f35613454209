import { writeFile } from "node:fs/promises";
import { z } from "zod";

import type { Logger } from "./logger.js";
import type { Task, TaskStoreDocument } from "./types.js";
import { nowISO, readJSONFile } from "./utils.js";

const taskSchema: z.ZodType<Task> = z.object({
  id: z.number().int().positive(),
  text: z.string(),
  status: z.enum(["pending", "completed"]),
  created_at: z.string(),
  completed_at: z.string().optional()
});

const documentSchema = z.object({
  tasks: z.array(taskSchema).default([]),
  task_id_counter: z.number().int().positive().default(1)
});

export interface TaskStoreDeps {
  filePath: string;
  logger: Logger;
  now?: () => string;
}

export interface TaskCounts {
  total: number;
  pending: number;
  completed: number;
}

export interface TaskStore {
  path: string;

  add(text: string): Promise<Task>;
  /** Marks the first task with `id` completed; `null` when there is none. */
  complete(id: number): Promise<Task | null>;
  /** Drops every task with `id`; `false` when nothing matched. */
  remove(id: number): Promise<boolean>;

  list(): Task[];
  counts(): TaskCounts;
  nextId(): number;

  /** Resolves once every queued write has settled. */
  flush(): Promise<void>;
}

function emptyDocument(): TaskStoreDocument {
  return { tasks: [], task_id_counter: 1 };
}

export async function loadTaskDocument(filePath: string, logger: Logger): Promise<TaskStoreDocument> {
  let raw: unknown;
  try {
    raw = await readJSONFile(filePath);
  } catch (err) {
    logger.warn({ file: filePath, err }, "task file unreadable; starting with an empty task list");
    return emptyDocument();
  }

  if (raw === undefined) {
    logger.info({ file: filePath }, "no task file yet; starting with an empty task list");
    return emptyDocument();
  }

  const parsed = documentSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { file: filePath, issues: parsed.error.issues },
      "task file is malformed; starting with an empty task list"
    );
    return emptyDocument();
  }

  const doc = parsed.data;
  const maxId = doc.tasks.reduce((max, t) => Math.max(max, t.id), 0);
  if (doc.task_id_counter <= maxId) {
    logger.warn(
      { file: filePath, task_id_counter: doc.task_id_counter, maxId },
      "task id counter behind stored ids; advancing it"
    );
    doc.task_id_counter = maxId + 1;
  }
  return doc;
}

export async function openTaskStore({ filePath, logger, now = nowISO }: TaskStoreDeps): Promise<TaskStore> {
  const doc = await loadTaskDocument(filePath, logger);
  let tasks = doc.tasks;
  let counter = doc.task_id_counter;

  logger.debug({ file: filePath, tasks: tasks.length, task_id_counter: counter }, "task store loaded");

  // One write at a time; each write serializes whatever state is current when it runs.
  let writes: Promise<void> = Promise.resolve();

  async function write() {
    const body: TaskStoreDocument = { tasks, task_id_counter: counter };
    try {
      await writeFile(filePath, JSON.stringify(body, null, 2));
    } catch (err) {
      logger.error({ file: filePath, err }, "failed to save tasks");
    }
  }

  function save() {
    writes = writes.then(write);
    return writes;
  }

  async function add(text: string) {
    const task: Task = {
      id: counter,
      text,
      status: "pending",
      created_at: now()
    };
    tasks.push(task);
    counter += 1;
    await save();
    return { ...task };
  }

  async function complete(id: number) {
    const task = tasks.find((t) => t.id === id);
    if (!task) return null;
    task.status = "completed";
    task.completed_at = now();
    await save();
    return { ...task };
  }

  async function remove(id: number) {
    const before = tasks.length;
    tasks = tasks.filter((t) => t.id !== id);
    if (tasks.length === before) return false;
    await save();
    return true;
  }

  function list() {
    return tasks.map((t) => ({ ...t }));
  }

  function counts(): TaskCounts {
    return {
      total: tasks.length,
      pending: tasks.filter((t) => t.status === "pending").length,
      completed: tasks.filter((t) => t.status === "completed").length
    };
  }

  return {
    path: filePath,

    add,
    complete,
    remove,

    list,
    counts,
    nextId: () => counter,

    flush: () => writes
  };
}
