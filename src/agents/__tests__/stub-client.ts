import { CancelledError } from "../../errors";
import type { AgentRole } from "../roles";
import type { CompletionOptions, InferenceClient, InferenceRequest } from "../../providers/types";

export type ScriptStep = string | Error | "hang";
export type StubScript = Partial<Record<AgentRole, ScriptStep[]>>;

export type StubClient = InferenceClient & {
  calls: InferenceRequest[];
  count: (role: AgentRole) => number;
};

const DEFAULTS: Record<AgentRole, string> = {
  plan: "1. One screen with a greeting",
  code: "```kotlin\nclass MainActivity\n```",
  review: "NO DEFECTS",
  debug: "ROOT_CAUSE: none\nFIX: none"
};

/** Replays scripted responses per role; the last step repeats once a script runs out. */
export function createStubClient(script: StubScript = {}): StubClient {
  const calls: InferenceRequest[] = [];
  const cursor: Partial<Record<AgentRole, number>> = {};
  const next = (role: AgentRole): ScriptStep => {
    const steps = script[role];
    if (!steps || steps.length === 0) {
      return DEFAULTS[role];
    }
    const index = cursor[role] ?? 0;
    cursor[role] = index + 1;
    return steps[Math.min(index, steps.length - 1)];
  };
  return {
    id: "stub",
    label: "Stub",
    calls,
    count: (role) => calls.filter((call) => call.role === role).length,
    complete: async (request: InferenceRequest, options: CompletionOptions = {}) => {
      calls.push(request);
      const step = next(request.role);
      if (step === "hang") {
        return new Promise<string>((_resolve, reject) => {
          const abort = () => reject(new CancelledError("stub call aborted"));
          if (options.signal?.aborted) {
            abort();
            return;
          }
          options.signal?.addEventListener("abort", abort, { once: true });
        });
      }
      if (step instanceof Error) {
        throw step;
      }
      return step;
    }
  };
}
