import * as fs from "fs/promises";
import * as path from "path";

export const TASK_STATUSES = ["pending", "running", "completed", "failed"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export interface Task {
  id: string;
  name: string;
  status: TaskStatus;
  startTime?: Date;
  endTime?: Date;
  progress?: number;
  message?: string;
  error?: string;
}

/** JSON form of a task (dates as ISO strings). */
interface SerializedTask {
  id: string;
  name: string;
  status: TaskStatus;
  startTime?: string;
  endTime?: string;
  progress?: number;
  message?: string;
  error?: string;
}

export interface TaskStatusReport {
  active: Task[];
  completed: Task[];
  failed: Task[];
  summary: { total: number; running: number; completed: number; failed: number };
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function toSerializedTask(value: unknown): SerializedTask | null {
  if (typeof value !== "object" || value === null) return null;
  const record = new Map<string, unknown>(Object.entries(value));
  const id = record.get("id");
  const name = record.get("name");
  const status = TASK_STATUSES.find((s) => s === record.get("status"));
  if (typeof id !== "string" || typeof name !== "string" || !status) return null;
  const progress = record.get("progress");
  return {
    id,
    name,
    status,
    startTime: optionalString(record.get("startTime")),
    endTime: optionalString(record.get("endTime")),
    progress: typeof progress === "number" ? progress : undefined,
    message: optionalString(record.get("message")),
    error: optionalString(record.get("error")),
  };
}

const byNewest =
  (field: "startTime" | "endTime") =>
  (a: Task, b: Task): number =>
    (b[field]?.getTime() ?? 0) - (a[field]?.getTime() ?? 0);

/**
 * Tracks the steps of a load or batch run. With persistence enabled the
 * list is written to `<root>/.medallion/tasks.json` so `medallion status`
 * can show the last run from another process.
 */
export class TaskTracker {
  private tasks = new Map<string, Task>();
  private taskCounter = 0;
  private persistPath: string | null = null;

  enablePersistence(rootDir: string): void {
    this.persistPath = path.join(rootDir, ".medallion", "tasks.json");
  }

  /** Load persisted tasks. A missing file means no previous run. */
  async load(): Promise<void> {
    if (!this.persistPath) return;
    let raw: string;
    try {
      raw = await fs.readFile(this.persistPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
      throw err;
    }
    const data: unknown = JSON.parse(raw);
    if (!Array.isArray(data)) return;

    for (const item of data) {
      const s = toSerializedTask(item);
      if (!s) continue;
      this.tasks.set(s.id, {
        ...s,
        startTime: s.startTime ? new Date(s.startTime) : undefined,
        endTime: s.endTime ? new Date(s.endTime) : undefined,
      });
      const m = s.id.match(/^task_(\d+)_/);
      if (m) this.taskCounter = Math.max(this.taskCounter, parseInt(m[1], 10));
    }
  }

  async save(): Promise<void> {
    if (!this.persistPath) return;
    await fs.mkdir(path.dirname(this.persistPath), { recursive: true });
    const data: SerializedTask[] = [...this.tasks.values()].map((t) => ({
      ...t,
      startTime: t.startTime?.toISOString(),
      endTime: t.endTime?.toISOString(),
    }));
    await fs.writeFile(this.persistPath, JSON.stringify(data, null, 2), "utf-8");
  }

  createTask(name: string): string {
    const id = `task_${++this.taskCounter}_${Date.now()}`;
    this.tasks.set(id, { id, name, status: "pending" });
    return id;
  }

  startTask(id: string, message?: string): void {
    const task = this.tasks.get(id);
    if (!task) return;
    task.status = "running";
    task.startTime = new Date();
    task.message = message;
  }

  updateTask(id: string, progress: number, message?: string): void {
    const task = this.tasks.get(id);
    if (!task) return;
    task.progress = progress;
    task.message = message;
  }

  completeTask(id: string, message?: string): void {
    const task = this.tasks.get(id);
    if (!task) return;
    task.status = "completed";
    task.endTime = new Date();
    task.message = message;
    task.progress = 100;
  }

  failTask(id: string, error: string): void {
    const task = this.tasks.get(id);
    if (!task) return;
    task.status = "failed";
    task.endTime = new Date();
    task.error = error;
  }

  getTask(id: string): Task | undefined {
    return this.tasks.get(id);
  }

  /** Drop everything, e.g. before a new run. */
  clear(): void {
    this.tasks.clear();
  }

  getStatus(): TaskStatusReport {
    const all = [...this.tasks.values()];
    const active = all.filter((t) => t.status === "running" || t.status === "pending");
    const completed = all.filter((t) => t.status === "completed");
    const failed = all.filter((t) => t.status === "failed");

    return {
      active: active.sort(byNewest("startTime")),
      completed: completed.sort(byNewest("endTime")).slice(0, 10),
      failed: failed.sort(byNewest("endTime")).slice(0, 10),
      summary: {
        total: this.tasks.size,
        running: active.filter((t) => t.status === "running").length,
        completed: completed.length,
        failed: failed.length,
      },
    };
  }
}
