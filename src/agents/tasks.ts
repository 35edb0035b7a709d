import crypto from "crypto";
import path from "path";
import { ensureDir } from "../platform/persistence";
import type { EventSink, TerminalStatus } from "./events";
import type { AgentOrchestrator } from "./orchestrator";

export type TaskContext = {
  taskId: string;
  taskDir: string;
};

export type TaskHandle = {
  id: string;
  dir: string;
  result: Promise<TerminalStatus>;
  cancel: () => void;
};

export type OrchestratorFactory = (context: TaskContext) => AgentOrchestrator;

export function newTaskId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..*$/, "").replace("T", "-");
  return `task-${stamp}-${crypto.randomBytes(3).toString("hex")}`;
}

export class TaskRegistry {
  private readonly active = new Map<string, AgentOrchestrator>();

  constructor(
    private readonly tasksRoot: string,
    private readonly createOrchestrator: OrchestratorFactory
  ) {}

  start(prompt: string, onEvent: EventSink, taskId: string = newTaskId()): TaskHandle {
    if (this.active.has(taskId)) {
      throw new Error(`Task ${taskId} is already running.`);
    }
    const taskDir = path.join(this.tasksRoot, taskId);
    ensureDir(taskDir);
    const orchestrator = this.createOrchestrator({ taskId, taskDir });
    this.active.set(taskId, orchestrator);
    const result = orchestrator.run(prompt, onEvent).finally(() => {
      this.active.delete(taskId);
    });
    return {
      id: taskId,
      dir: taskDir,
      result,
      cancel: () => orchestrator.cancel()
    };
  }

  activeIds(): string[] {
    return Array.from(this.active.keys()).sort();
  }

  cancel(taskId: string): boolean {
    const orchestrator = this.active.get(taskId);
    if (!orchestrator) {
      return false;
    }
    orchestrator.cancel();
    return true;
  }

  cancelAll(): number {
    const running = Array.from(this.active.values());
    running.forEach((orchestrator) => orchestrator.cancel());
    return running.length;
  }
}
