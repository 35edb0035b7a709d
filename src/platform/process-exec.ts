import { SpawnSyncOptionsWithStringEncoding, SpawnSyncReturns, spawn, spawnSync } from "child_process";
import { Readable } from "stream";
import { finished } from "stream/promises";

type RunSyncArgs = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
  timeout?: number;
  encoding?: BufferEncoding;
};

export type LaunchOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
  input?: string;
};

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
};

export type LaunchedProcess = {
  pid?: number;
  stdout: Readable;
  stderr: Readable;
  exited: Promise<ProcessExit>;
  kill: (signal?: NodeJS.Signals) => void;
};

export type ProcessLauncher = (command: string, args: string[], options: LaunchOptions) => LaunchedProcess;

export type RunProcessOptions = LaunchOptions & {
  signal?: AbortSignal;
  timeoutMs?: number;
  killGraceMs?: number;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
  launch?: ProcessLauncher;
};

export type RunProcessOutcome = ProcessExit & {
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
};

const DEFAULT_KILL_GRACE_MS = 5000;

function shouldUseWindowsShell(command: string): boolean {
  if (process.platform !== "win32") {
    return false;
  }
  const normalized = command.toLowerCase();
  return normalized.endsWith(".cmd") || normalized.endsWith(".bat");
}

export function runCommandSync(command: string, args: string[], options: RunSyncArgs = {}): SpawnSyncReturns<string> {
  const shell = typeof options.shell === "boolean" ? options.shell : shouldUseWindowsShell(command);
  const spawnOptions: SpawnSyncOptionsWithStringEncoding = {
    cwd: options.cwd,
    env: options.env,
    shell,
    timeout: options.timeout,
    encoding: options.encoding ?? "utf-8",
    windowsHide: process.platform === "win32"
  };
  return spawnSync(command, args, spawnOptions);
}

export function launchProcess(command: string, args: string[], options: LaunchOptions = {}): LaunchedProcess {
  const shell = typeof options.shell === "boolean" ? options.shell : shouldUseWindowsShell(command);
  const child = spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    shell,
    windowsHide: process.platform === "win32"
  });
  // EPIPE when the child exits before reading its input
  child.stdin.on("error", () => undefined);
  if (typeof options.input === "string") {
    child.stdin.end(options.input);
  } else {
    child.stdin.end();
  }
  const exited = new Promise<ProcessExit>((resolve) => {
    child.once("error", (error) => resolve({ code: null, signal: null, error }));
    child.once("close", (code, signal) => resolve({ code, signal }));
  });
  return {
    pid: child.pid,
    stdout: child.stdout,
    stderr: child.stderr,
    exited,
    kill: (signal) => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    }
  };
}

async function drained(stream: Readable): Promise<void> {
  try {
    await finished(stream);
  } catch {
    // a destroyed pipe still counts as drained
  }
}

export async function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions = {}
): Promise<RunProcessOutcome> {
  const startedAt = Date.now();
  if (options.signal?.aborted) {
    return { code: null, signal: null, timedOut: false, aborted: true, durationMs: 0 };
  }
  const launch = options.launch ?? launchProcess;
  const child = launch(command, args, {
    cwd: options.cwd,
    env: options.env,
    shell: options.shell,
    input: options.input
  });

  let timedOut = false;
  let aborted = false;
  let killTimer: NodeJS.Timeout | undefined;
  const terminate = () => {
    if (killTimer) {
      return;
    }
    child.kill("SIGTERM");
    killTimer = setTimeout(() => child.kill("SIGKILL"), options.killGraceMs ?? DEFAULT_KILL_GRACE_MS);
  };
  const timeoutTimer =
    options.timeoutMs && options.timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          terminate();
        }, options.timeoutMs)
      : undefined;
  const onAbort = () => {
    aborted = true;
    terminate();
  };
  options.signal?.addEventListener("abort", onAbort, { once: true });

  child.stdout.setEncoding("utf-8");
  child.stderr.setEncoding("utf-8");
  child.stdout.on("data", (chunk: string) => options.onStdout?.(chunk));
  child.stderr.on("data", (chunk: string) => options.onStderr?.(chunk));

  try {
    const [exit] = await Promise.all([child.exited, drained(child.stdout), drained(child.stderr)]);
    return { ...exit, timedOut, aborted, durationMs: Date.now() - startedAt };
  } finally {
    if (timeoutTimer) {
      clearTimeout(timeoutTimer);
    }
    if (killTimer) {
      clearTimeout(killTimer);
    }
    options.signal?.removeEventListener("abort", onAbort);
  }
}
