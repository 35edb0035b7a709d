export type RuntimeFlags = {
  nonInteractive: boolean;
  acceptLicenses: boolean;
  project?: string;
  output?: string;
  provider?: string;
  model?: string;
  template?: string;
  language?: string;
  minSdk?: number;
  targetSdk?: number;
  maxDebugIterations?: number;
  buildTimeoutSeconds?: number;
};

const flags: RuntimeFlags = {
  nonInteractive: false,
  acceptLicenses: false,
  project: undefined,
  output: undefined,
  provider: process.env.APKF_AI_PROVIDER_DEFAULT,
  model: process.env.APKF_AI_MODEL_DEFAULT,
  template: undefined,
  language: undefined,
  minSdk: undefined,
  targetSdk: undefined,
  maxDebugIterations: undefined,
  buildTimeoutSeconds: undefined
};

function optionalInt(value: unknown, fallback: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const raw = Number(value);
  return Number.isFinite(raw) ? Math.trunc(raw) : fallback;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : undefined;
}

export function setFlags(next: Partial<RuntimeFlags>): void {
  if ("nonInteractive" in next) {
    flags.nonInteractive = Boolean(next.nonInteractive);
  }
  if ("acceptLicenses" in next) {
    flags.acceptLicenses = Boolean(next.acceptLicenses);
  }
  if ("project" in next) {
    flags.project = optionalString(next.project);
  }
  if ("output" in next) {
    flags.output = optionalString(next.output);
  }
  if ("provider" in next) {
    flags.provider = optionalString(next.provider) ?? flags.provider;
  }
  if ("model" in next) {
    flags.model = optionalString(next.model) ?? flags.model;
  }
  if ("template" in next) {
    flags.template = optionalString(next.template);
  }
  if ("language" in next) {
    flags.language = optionalString(next.language);
  }
  if ("minSdk" in next) {
    flags.minSdk = optionalInt(next.minSdk, flags.minSdk);
  }
  if ("targetSdk" in next) {
    flags.targetSdk = optionalInt(next.targetSdk, flags.targetSdk);
  }
  if ("maxDebugIterations" in next) {
    flags.maxDebugIterations = optionalInt(next.maxDebugIterations, flags.maxDebugIterations);
  }
  if ("buildTimeoutSeconds" in next) {
    flags.buildTimeoutSeconds = optionalInt(next.buildTimeoutSeconds, flags.buildTimeoutSeconds);
  }
}

export function getFlags(): RuntimeFlags {
  return { ...flags };
}
