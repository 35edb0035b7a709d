import { PassThrough } from "stream";
import type { LaunchOptions, ProcessExit, ProcessLauncher } from "../../platform/process-exec";

export type FakeRun = {
  stdout?: string;
  stderr?: string;
  code?: number;
  // Keeps running until killed.
  hang?: boolean;
  // Runs before the fake process exits, e.g. to drop an artifact.
  effect?: (args: string[]) => void;
};

export type Launch = {
  command: string;
  args: string[];
  options: LaunchOptions;
};

export function fakeLauncher(run: FakeRun): { launch: ProcessLauncher; launches: Launch[] } {
  const launches: Launch[] = [];
  const launch: ProcessLauncher = (command, args, options) => {
    launches.push({ command, args, options });
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    let settle: (exit: ProcessExit) => void = () => undefined;
    const exited = new Promise<ProcessExit>((resolve) => {
      settle = resolve;
    });
    let done = false;
    const finish = (exit: ProcessExit) => {
      if (done) {
        return;
      }
      done = true;
      stdout.end();
      stderr.end();
      settle(exit);
    };
    setImmediate(() => {
      if (run.stdout) {
        stdout.write(run.stdout);
      }
      if (run.stderr) {
        stderr.write(run.stderr);
      }
      if (!run.hang) {
        run.effect?.(args);
        finish({ code: run.code ?? 0, signal: null });
      }
    });
    return {
      pid: 4242,
      stdout,
      stderr,
      exited,
      kill: (signal) => finish({ code: null, signal: signal ?? "SIGTERM" })
    };
  };
  return { launch, launches };
}
