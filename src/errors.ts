import type { FailedBuild } from "./build/runner";

export type ErrorKind =
  | "transient_inference"
  | "fatal_inference"
  | "template"
  | "file_system"
  | "toolchain_install"
  | "license_gate"
  | "build_failure"
  | "cancelled";

export const ERROR_CODES: Record<ErrorKind, string> = {
  transient_inference: "AF-3001",
  fatal_inference: "AF-3002",
  template: "AF-4001",
  file_system: "AF-4002",
  toolchain_install: "AF-5001",
  license_gate: "AF-5002",
  build_failure: "AF-6001",
  cancelled: "AF-7001"
};

export abstract class ForgeError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  get code(): string {
    return ERROR_CODES[this.kind];
  }
}

export class TransientInferenceError extends ForgeError {
  readonly kind = "transient_inference";
}

export class FatalInferenceError extends ForgeError {
  readonly kind = "fatal_inference";
}

export class TemplateError extends ForgeError {
  readonly kind = "template";
}

export class FileSystemError extends ForgeError {
  readonly kind = "file_system";

  constructor(
    message: string,
    readonly filePath?: string
  ) {
    super(message);
  }
}

export class ToolchainInstallError extends ForgeError {
  readonly kind = "toolchain_install";

  constructor(
    message: string,
    readonly componentId?: string
  ) {
    super(message);
  }
}

export class LicenseGateError extends ForgeError {
  readonly kind = "license_gate";

  constructor(
    message: string,
    readonly licenseId: string
  ) {
    super(message);
  }
}

export type BuildFailureReason = "exit-code" | "artifact-missing" | "timeout" | "cancelled" | "spawn-error";

export class BuildFailure extends ForgeError {
  readonly kind = "build_failure";

  constructor(
    message: string,
    readonly reason: BuildFailureReason,
    readonly logExcerpt: string
  ) {
    super(message);
  }

  static fromResult(result: FailedBuild): BuildFailure {
    return new BuildFailure(`${result.message} (log: ${result.logPath})`, result.reason, result.logExcerpt);
  }
}

export class CancelledError extends ForgeError {
  readonly kind = "cancelled";

  constructor(message = "Operation cancelled") {
    super(message);
  }
}

export function isCancelled(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return true;
  }
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === "string" && error.trim()) {
    return error;
  }
  return "Unknown error";
}

export function errorCode(error: unknown, fallback = "AF-1000"): string {
  return error instanceof ForgeError ? error.code : fallback;
}

export function formatError(code: string, message: string): string {
  return `[${code}] ${message}`;
}

export function printError(code: string, message: string): void {
  console.log(formatError(code, message));
}
