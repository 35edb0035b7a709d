import path from "path";
import type { ProjectLanguage } from "../config";
import { CancelledError, TransientInferenceError, describeError, errorCode, isCancelled } from "../errors";
import { ActivityLog, createActivityLog } from "../platform/activity-log";
import type { GenerationParams, InferenceClient } from "../providers/types";
import { SourceFile, extractSourceFiles } from "./code-extract";
import {
  AgentEvent,
  EventSink,
  TerminalStatus,
  advisory,
  cancelled,
  done,
  failed,
  outputFile,
  progress
} from "./events";
import { MemoryLog, MemorySnapshot } from "./memory";
import { OutputWriter, createOutputWriter } from "./output-writer";
import { withRetry } from "./retry";
import { DefectDetector, createDefectDetector, extractDefects } from "./review";
import { AgentRole, systemPromptFor } from "./roles";
import {
  TaskRecord,
  TaskStage,
  emptyTaskRecord,
  isTerminalStage,
  recordStage,
  saveTaskRecord
} from "./task-record";

export type OrchestratorOptions = {
  taskId: string;
  taskDir: string;
  client: InferenceClient;
  language: ProjectLanguage;
  params: GenerationParams;
  maxDebugIterations: number;
  detectDefects?: DefectDetector;
  inferenceRetries?: number;
  retryBaseDelayMs?: number;
  writer?: OutputWriter;
  log?: ActivityLog;
  signal?: AbortSignal;
  persist?: boolean;
};

const STAGE_LABELS: Partial<Record<TaskStage, string>> = {
  planning: "Planning",
  coding: "Coding",
  reviewing: "Reviewing",
  debugging: "Debugging"
};

function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export function codingPrompt(prompt: string, feedback?: string): string {
  if (!feedback) {
    return prompt;
  }
  return `${prompt}\n\nReviewer feedback to address:\n${feedback}`;
}

export class AgentOrchestrator {
  private readonly memory = new MemoryLog();
  private readonly controller = new AbortController();
  private readonly detectDefects: DefectDetector;
  private readonly writer: OutputWriter;
  private readonly log: ActivityLog;
  private record: TaskRecord;
  private started = false;
  private codingPasses = 0;
  private debugIterations = 0;
  private latestOutputs: string[] = [];
  private sink: EventSink = () => undefined;

  constructor(private readonly options: OrchestratorOptions) {
    this.detectDefects = options.detectDefects ?? createDefectDetector();
    this.writer = options.writer ?? createOutputWriter(options.taskDir);
    this.log = options.log ?? createActivityLog(path.join(options.taskDir, "task.log"));
    this.record = emptyTaskRecord(options.taskId, "");
    const external = options.signal;
    if (external) {
      if (external.aborted) {
        this.controller.abort();
      } else {
        external.addEventListener("abort", () => this.controller.abort(), { once: true });
      }
    }
  }

  get id(): string {
    return this.options.taskId;
  }

  get stage(): TaskStage {
    return this.record.stage;
  }

  get memorySnapshot(): MemorySnapshot {
    return this.memory.snapshot();
  }

  cancel(): void {
    if (!isTerminalStage(this.record.stage)) {
      this.log(`Cancellation requested during ${this.record.stage}`);
    }
    this.controller.abort();
  }

  async run(prompt: string, onEvent: EventSink): Promise<TerminalStatus> {
    if (this.started) {
      throw new Error(`Task ${this.id} has already been started; orchestrators are single-use.`);
    }
    this.started = true;
    this.sink = onEvent;
    this.record = emptyTaskRecord(this.id, prompt);
    this.log(`Task ${this.id} started`);

    try {
      this.enter("planning");
      await this.invoke("plan", prompt);

      let feedback: string | undefined;
      while (true) {
        this.enter("coding");
        const response = await this.invoke("code", codingPrompt(prompt, feedback));
        this.codingPasses += 1;

        this.enter("writing");
        this.writeOutput(extractSourceFiles(response, this.options.language));

        this.enter("reviewing");
        const review = await this.invoke("review", prompt);
        if (!this.detectDefects(review)) {
          break;
        }
        if (this.debugIterations >= this.options.maxDebugIterations) {
          this.emit(
            advisory(
              `Reviewer still reports defects after ${this.debugIterations} debug iteration(s); keeping the latest code.`
            )
          );
          break;
        }

        this.debugIterations += 1;
        this.enter("debugging");
        const fixes = await this.invoke("debug", debugPrompt(prompt, review));
        feedback = [review.trim(), fixes.trim()].filter(Boolean).join("\n\n");
      }

      const summary = this.summary();
      this.enter("done", summary);
      this.emit(done(summary));
      return "done";
    } catch (error) {
      if (isCancelled(error) || this.controller.signal.aborted) {
        const message = `Task ${this.id} cancelled during ${this.record.stage}`;
        this.enter("cancelled", message);
        this.emit(cancelled(message));
        return "cancelled";
      }
      const message = describeError(error);
      this.enter("error", message);
      this.emit(failed(message, errorCode(error)));
      return "error";
    }
  }

  private summary(): string {
    const files = this.latestOutputs.map((file) => path.basename(file)).join(", ");
    return `Generated ${files} after ${this.codingPasses} coding pass(es) and ${this.debugIterations} debug iteration(s).`;
  }

  private emit(event: AgentEvent): void {
    try {
      this.sink(event);
    } catch (error) {
      this.log(`Event sink failed on ${event.kind}: ${describeError(error)}`);
    }
  }

  private enter(stage: TaskStage, details?: string): void {
    this.record = recordStage(this.record, stage, this.memory.snapshot(), details);
    this.record = { ...this.record, debugIterations: this.debugIterations };
    this.log(`Stage ${stage}${details ? `: ${details}` : ""}`);
    if (this.options.persist !== false) {
      try {
        saveTaskRecord(this.options.taskDir, this.record);
      } catch (error) {
        if (!isTerminalStage(stage)) {
          throw error;
        }
        this.log(`Could not persist final task record: ${describeError(error)}`);
      }
    }
    const label = STAGE_LABELS[stage];
    if (label) {
      this.emit(progress(label));
    }
  }

  // Files from an earlier pass that the latest pass no longer produces are removed.
  private writeOutput(files: SourceFile[]): void {
    const written = files.map((file) => this.writer.write(file.name, file.contents));
    for (const superseded of this.latestOutputs.filter((file) => !written.includes(file))) {
      this.writer.remove(superseded);
      this.log(`Removed ${path.basename(superseded)}; the latest coding pass no longer produces it`);
    }
    this.latestOutputs = written;
    this.record = { ...this.record, outputFiles: written };
    for (const file of written) {
      this.emit(outputFile(file));
    }
  }

  private async invoke(role: AgentRole, userPrompt: string): Promise<string> {
    const signal = this.controller.signal;
    const memory = this.memory.snapshot();
    const text = await withRetry(
      async () => {
        const completion = await abortable(
          this.options.client.complete(
            {
              role,
              systemPrompt: systemPromptFor(role, this.options.language),
              userPrompt,
              memory,
              params: this.options.params
            },
            { signal }
          ),
          signal
        );
        if (!completion.trim()) {
          throw new TransientInferenceError(`${this.options.client.label} returned an empty ${role} completion`);
        }
        return completion;
      },
      {
        maxRetries: this.options.inferenceRetries ?? 2,
        initialDelayMs: this.options.retryBaseDelayMs ?? 1000,
        signal,
        onRetry: (attempt, delayMs, error) =>
          this.log(`Retrying ${role} after attempt ${attempt} in ${delayMs}ms: ${error.message}`)
      }
    );
    if (signal.aborted) {
      throw new CancelledError();
    }
    this.memory.append(role, text);
    return text;
  }
}

export function debugPrompt(prompt: string, review: string): string {
  const defects = extractDefects(review);
  const listed = defects.length > 0 ? defects.map((defect) => `- ${defect}`).join("\n") : review.trim();
  return `${prompt}\n\nThe reviewer reported:\n${listed}`;
}
