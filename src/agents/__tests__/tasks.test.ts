import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "@jest/globals";
import { AgentOrchestrator } from "../orchestrator";
import { OrchestratorFactory, TaskRegistry, newTaskId } from "../tasks";
import { StubScript, createStubClient } from "./stub-client";

function factory(script: StubScript = {}): OrchestratorFactory {
  return ({ taskId, taskDir }) =>
    new AgentOrchestrator({
      taskId,
      taskDir,
      client: createStubClient(script),
      language: "kotlin",
      params: { contextSize: 4096, temperature: 0.2, maxTokens: 1024 },
      maxDebugIterations: 1,
      retryBaseDelayMs: 1
    });
}

describe("newTaskId", () => {
  it("stamps the id with the UTC time and a random suffix", () => {
    expect(newTaskId(new Date("2026-01-02T03:04:05.678Z"))).toMatch(/^task-20260102-030405-[0-9a-f]{6}$/);
  });
});

describe("TaskRegistry", () => {
  let tasksRoot: string;

  beforeEach(() => {
    tasksRoot = fs.mkdtempSync(path.join(os.tmpdir(), "apkforge-tasks-"));
  });

  afterEach(() => {
    fs.rmSync(tasksRoot, { recursive: true, force: true });
  });

  it("runs a task in its own directory and forgets it when finished", async () => {
    const registry = new TaskRegistry(tasksRoot, factory());
    const handle = registry.start("Timer", () => undefined, "task-a");

    expect(handle.dir).toBe(path.join(tasksRoot, "task-a"));
    expect(registry.activeIds()).toEqual(["task-a"]);
    await expect(handle.result).resolves.toBe("done");
    expect(registry.activeIds()).toEqual([]);
    expect(fs.existsSync(path.join(tasksRoot, "task-a", "generated", "MainActivity.kt"))).toBe(true);
  });

  it("rejects a duplicate running id", async () => {
    const registry = new TaskRegistry(tasksRoot, factory({ plan: ["hang"] }));
    const handle = registry.start("Timer", () => undefined, "task-a");

    expect(() => registry.start("Timer", () => undefined, "task-a")).toThrow("Task task-a is already running.");
    handle.cancel();
    await expect(handle.result).resolves.toBe("cancelled");
  });

  it("cancels one task by id", async () => {
    const registry = new TaskRegistry(tasksRoot, factory({ plan: ["hang"] }));
    const handle = registry.start("Timer", () => undefined, "task-a");

    expect(registry.cancel("task-a")).toBe(true);
    expect(registry.cancel("missing")).toBe(false);
    await expect(handle.result).resolves.toBe("cancelled");
  });

  it("cancels every running task", async () => {
    const registry = new TaskRegistry(tasksRoot, factory({ plan: ["hang"] }));
    const first = registry.start("Timer", () => undefined, "task-a");
    const second = registry.start("Notes", () => undefined, "task-b");

    expect(registry.cancelAll()).toBe(2);
    await expect(Promise.all([first.result, second.result])).resolves.toEqual(["cancelled", "cancelled"]);
  });
});
