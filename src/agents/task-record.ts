import path from "path";
import { readJsonFile, writeJsonAtomic } from "../platform/persistence";
import type { MemorySnapshot } from "./memory";

export type TaskStage =
  | "idle"
  | "planning"
  | "coding"
  | "writing"
  | "reviewing"
  | "debugging"
  | "done"
  | "error"
  | "cancelled";

export type TaskStatus = "pending" | "running" | "done" | "error" | "cancelled";

type StageRecord = {
  stage: TaskStage;
  at: string;
  details?: string;
};

export type TaskRecord = {
  version: 1;
  id: string;
  prompt: string;
  status: TaskStatus;
  stage: TaskStage;
  debugIterations: number;
  outputFiles: string[];
  history: StageRecord[];
  memory: Array<{ index: number; role: string; text: string }>;
};

const TERMINAL: TaskStage[] = ["done", "error", "cancelled"];

// Allowed transitions; debugging is the only edge that points back.
const NEXT: Record<TaskStage, TaskStage[]> = {
  idle: ["planning"],
  planning: ["coding"],
  coding: ["writing"],
  writing: ["reviewing"],
  reviewing: ["debugging", "done"],
  debugging: ["coding"],
  done: [],
  error: [],
  cancelled: []
};

export function taskRecordPath(taskDir: string): string {
  return path.join(taskDir, "task.json");
}

export function emptyTaskRecord(id: string, prompt: string): TaskRecord {
  return {
    version: 1,
    id,
    prompt,
    status: "pending",
    stage: "idle",
    debugIterations: 0,
    outputFiles: [],
    history: [],
    memory: []
  };
}

export function isTerminalStage(stage: TaskStage): boolean {
  return TERMINAL.includes(stage);
}

export function canEnterStage(from: TaskStage, to: TaskStage): { ok: boolean; reason?: string } {
  if (isTerminalStage(from)) {
    return { ok: false, reason: `Task already finished (${from}).` };
  }
  if (isTerminalStage(to) || NEXT[from].includes(to)) {
    return { ok: true };
  }
  return { ok: false, reason: `Cannot enter ${to} from ${from}.` };
}

export function statusForStage(stage: TaskStage): TaskStatus {
  if (stage === "idle") {
    return "pending";
  }
  if (stage === "done" || stage === "error" || stage === "cancelled") {
    return stage;
  }
  return "running";
}

export function recordStage(record: TaskRecord, stage: TaskStage, memory: MemorySnapshot, details?: string): TaskRecord {
  const check = canEnterStage(record.stage, stage);
  if (!check.ok) {
    throw new Error(check.reason);
  }
  return {
    ...record,
    stage,
    status: statusForStage(stage),
    history: [...record.history, { stage, at: new Date().toISOString(), details }],
    memory: memory.map((entry) => ({ index: entry.index, role: entry.role, text: entry.text }))
  };
}

export function saveTaskRecord(taskDir: string, record: TaskRecord): void {
  writeJsonAtomic(taskRecordPath(taskDir), record);
}

export function loadTaskRecord(taskDir: string): TaskRecord | null {
  const parsed = readJsonFile<Partial<TaskRecord>>(taskRecordPath(taskDir));
  if (!parsed || parsed.version !== 1 || typeof parsed.id !== "string") {
    return null;
  }
  return {
    ...emptyTaskRecord(parsed.id, parsed.prompt ?? ""),
    ...parsed,
    version: 1,
    id: parsed.id
  };
}
