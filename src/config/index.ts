import fs from "fs";
import os from "os";
import path from "path";

export type ProviderDefault = "gemini" | "codex" | "ollama" | "mock" | "auto";
export type ProjectLanguage = "kotlin" | "java";

export type ForgeConfig = {
  workspace: {
    default_root: string;
  };
  ai: {
    preferred_provider: ProviderDefault;
    model: string;
    endpoint: string;
    context_size: number;
    temperature: number;
    max_tokens: number;
  };
  pipeline: {
    max_debug_iterations: number;
    defect_markers: string[];
    inference_retries: number;
    retry_base_delay_ms: number;
  };
  project: {
    template: string;
    language: ProjectLanguage;
    min_sdk: number;
    target_sdk: number;
  };
  build: {
    timeout_seconds: number;
    max_parallel: number;
    log_tail_lines: number;
  };
  toolchain: {
    root: string;
    accept_licenses: boolean;
  };
};

type KeyHandler = {
  apply: (config: ForgeConfig, raw: string) => boolean;
  render: (config: ForgeConfig) => string;
};

export const DEFAULT_DEFECT_MARKERS = ["DEFECT:", "BUG:", "ISSUES FOUND", "FAIL"];

function homeDocumentsDir(): string {
  return path.join(os.homedir(), "Documents");
}

export function configPath(): string {
  const override = process.env.APKF_CONFIG_PATH?.trim();
  if (override) {
    return path.resolve(override);
  }
  const root = process.env.APPDATA
    ? path.join(process.env.APPDATA, "apkforge")
    : path.join(os.homedir(), ".config", "apkforge");
  return path.join(root, "config.yml");
}

export function defaultConfig(): ForgeConfig {
  return {
    workspace: {
      default_root: path.join(homeDocumentsDir(), "apkforge-projects")
    },
    ai: {
      preferred_provider: "auto",
      model: "",
      endpoint: "http://127.0.0.1:11434",
      context_size: 2048,
      temperature: 0.1,
      max_tokens: 1024
    },
    pipeline: {
      max_debug_iterations: 2,
      defect_markers: [...DEFAULT_DEFECT_MARKERS],
      inference_retries: 2,
      retry_base_delay_ms: 1000
    },
    project: {
      template: "empty-activity",
      language: "kotlin",
      min_sdk: 24,
      target_sdk: 34
    },
    build: {
      timeout_seconds: 1800,
      max_parallel: Math.max(1, Math.min(2, os.cpus().length)),
      log_tail_lines: 200
    },
    toolchain: {
      root: "",
      accept_licenses: false
    }
  };
}

export function normalizeProvider(value: string): ProviderDefault | null {
  const clean = value.trim().toLowerCase();
  if (clean === "gemini" || clean === "codex" || clean === "ollama" || clean === "mock" || clean === "auto") {
    return clean;
  }
  return null;
}

export function normalizeLanguage(value: string): ProjectLanguage | null {
  const clean = value.trim().toLowerCase();
  if (clean === "kotlin" || clean === "kt") {
    return "kotlin";
  }
  if (clean === "java") {
    return "java";
  }
  return null;
}

function parseIntInRange(raw: string, min: number, max: number): number | null {
  const value = Number.parseInt(raw.trim(), 10);
  if (!Number.isFinite(value) || value < min || value > max) {
    return null;
  }
  return value;
}

function parseBoolean(raw: string): boolean | null {
  const clean = raw.trim().toLowerCase();
  if (clean === "true" || clean === "yes" || clean === "1") {
    return true;
  }
  if (clean === "false" || clean === "no" || clean === "0") {
    return false;
  }
  return null;
}

function expandRoot(value: string): string {
  let out = value.trim();
  const home = os.homedir();
  out = out.replace(/\{\{home\}\}/gi, home);
  if (out.startsWith("~/")) {
    out = path.join(home, out.slice(2));
  }
  return path.resolve(out);
}

function intHandler(
  pick: (config: ForgeConfig) => { get: () => number; set: (value: number) => void },
  min: number,
  max: number
): KeyHandler {
  return {
    apply: (config, raw) => {
      const value = parseIntInRange(raw, min, max);
      if (value === null) {
        return false;
      }
      pick(config).set(value);
      return true;
    },
    render: (config) => String(pick(config).get())
  };
}

const KEY_HANDLERS: Record<string, KeyHandler> = {
  "workspace.default_root": {
    apply: (config, raw) => {
      if (!raw.trim()) {
        return false;
      }
      config.workspace.default_root = expandRoot(raw);
      return true;
    },
    render: (config) => config.workspace.default_root
  },
  "ai.preferred_provider": {
    apply: (config, raw) => {
      const provider = normalizeProvider(raw);
      if (!provider) {
        return false;
      }
      config.ai.preferred_provider = provider;
      return true;
    },
    render: (config) => config.ai.preferred_provider
  },
  "ai.model": {
    apply: (config, raw) => {
      config.ai.model = raw.trim();
      return true;
    },
    render: (config) => config.ai.model
  },
  "ai.endpoint": {
    apply: (config, raw) => {
      if (!/^https?:\/\//i.test(raw.trim())) {
        return false;
      }
      config.ai.endpoint = raw.trim().replace(/\/+$/, "");
      return true;
    },
    render: (config) => config.ai.endpoint
  },
  "ai.context_size": intHandler(
    (config) => ({ get: () => config.ai.context_size, set: (value) => (config.ai.context_size = value) }),
    256,
    131072
  ),
  "ai.temperature": {
    apply: (config, raw) => {
      const value = Number.parseFloat(raw.trim());
      if (!Number.isFinite(value) || value < 0 || value > 2) {
        return false;
      }
      config.ai.temperature = value;
      return true;
    },
    render: (config) => String(config.ai.temperature)
  },
  "ai.max_tokens": intHandler(
    (config) => ({ get: () => config.ai.max_tokens, set: (value) => (config.ai.max_tokens = value) }),
    16,
    65536
  ),
  "pipeline.max_debug_iterations": intHandler(
    (config) => ({
      get: () => config.pipeline.max_debug_iterations,
      set: (value) => (config.pipeline.max_debug_iterations = value)
    }),
    0,
    10
  ),
  "pipeline.defect_markers": {
    apply: (config, raw) => {
      const markers = raw
        .split(",")
        .map((marker) => marker.trim())
        .filter((marker) => marker.length > 0);
      if (markers.length === 0) {
        return false;
      }
      config.pipeline.defect_markers = markers;
      return true;
    },
    render: (config) => config.pipeline.defect_markers.join(", ")
  },
  "pipeline.inference_retries": intHandler(
    (config) => ({
      get: () => config.pipeline.inference_retries,
      set: (value) => (config.pipeline.inference_retries = value)
    }),
    0,
    8
  ),
  "pipeline.retry_base_delay_ms": intHandler(
    (config) => ({
      get: () => config.pipeline.retry_base_delay_ms,
      set: (value) => (config.pipeline.retry_base_delay_ms = value)
    }),
    0,
    60000
  ),
  "project.template": {
    apply: (config, raw) => {
      if (!/^[a-z0-9][a-z0-9-]*$/.test(raw.trim())) {
        return false;
      }
      config.project.template = raw.trim();
      return true;
    },
    render: (config) => config.project.template
  },
  "project.language": {
    apply: (config, raw) => {
      const language = normalizeLanguage(raw);
      if (!language) {
        return false;
      }
      config.project.language = language;
      return true;
    },
    render: (config) => config.project.language
  },
  "project.min_sdk": intHandler(
    (config) => ({ get: () => config.project.min_sdk, set: (value) => (config.project.min_sdk = value) }),
    21,
    40
  ),
  "project.target_sdk": intHandler(
    (config) => ({ get: () => config.project.target_sdk, set: (value) => (config.project.target_sdk = value) }),
    21,
    40
  ),
  "build.timeout_seconds": intHandler(
    (config) => ({ get: () => config.build.timeout_seconds, set: (value) => (config.build.timeout_seconds = value) }),
    10,
    86400
  ),
  "build.max_parallel": intHandler(
    (config) => ({ get: () => config.build.max_parallel, set: (value) => (config.build.max_parallel = value) }),
    1,
    64
  ),
  "build.log_tail_lines": intHandler(
    (config) => ({ get: () => config.build.log_tail_lines, set: (value) => (config.build.log_tail_lines = value) }),
    10,
    10000
  ),
  "toolchain.root": {
    apply: (config, raw) => {
      config.toolchain.root = raw.trim() ? expandRoot(raw) : "";
      return true;
    },
    render: (config) => config.toolchain.root
  },
  "toolchain.accept_licenses": {
    apply: (config, raw) => {
      const value = parseBoolean(raw);
      if (value === null) {
        return false;
      }
      config.toolchain.accept_licenses = value;
      return true;
    },
    render: (config) => (config.toolchain.accept_licenses ? "true" : "false")
  }
};

export function configKeys(): string[] {
  return Object.keys(KEY_HANDLERS);
}

function cloneConfig(config: ForgeConfig): ForgeConfig {
  return {
    workspace: { ...config.workspace },
    ai: { ...config.ai },
    pipeline: { ...config.pipeline, defect_markers: [...config.pipeline.defect_markers] },
    project: { ...config.project },
    build: { ...config.build },
    toolchain: { ...config.toolchain }
  };
}

export function parseSimpleYaml(raw: string, base: ForgeConfig = defaultConfig()): ForgeConfig {
  const result = cloneConfig(base);
  let section = "";
  const lines = raw.split(/\r?\n/);
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    // Only unindented keys open a section; "  model:" is an empty value.
    const sectionMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*$/.exec(line);
    if (sectionMatch) {
      section = sectionMatch[1];
      continue;
    }
    const valueMatch = /^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*?)\s*$/.exec(trimmed);
    if (!valueMatch || !section) {
      continue;
    }
    const handler = KEY_HANDLERS[`${section}.${valueMatch[1]}`];
    if (!handler) {
      continue;
    }
    handler.apply(result, valueMatch[2].replace(/^["']|["']$/g, ""));
  }
  return result;
}

export function renderYaml(config: ForgeConfig): string {
  const lines = ["# apkforge configuration", "# workspace.default_root accepts ~/ and {{home}}"];
  let section = "";
  for (const [key, handler] of Object.entries(KEY_HANDLERS)) {
    const [nextSection, field] = key.split(".");
    if (nextSection !== section) {
      section = nextSection;
      lines.push(`${section}:`);
    }
    lines.push(`  ${field}: ${handler.render(config)}`);
  }
  lines.push("");
  return lines.join("\n");
}

export function loadConfig(): ForgeConfig {
  const defaults = defaultConfig();
  const file = configPath();
  if (!fs.existsSync(file)) {
    return defaults;
  }
  try {
    return parseSimpleYaml(fs.readFileSync(file, "utf-8"), defaults);
  } catch {
    return defaults;
  }
}

export function saveConfig(config: ForgeConfig): string {
  const file = configPath();
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, renderYaml(config), "utf-8");
  return file;
}

export function ensureConfig(): ForgeConfig {
  const existing = loadConfig();
  if (!fs.existsSync(configPath())) {
    saveConfig(existing);
  }
  fs.mkdirSync(existing.workspace.default_root, { recursive: true });
  return existing;
}

export function updateConfigValue(key: string, value: string): ForgeConfig | null {
  const handler = KEY_HANDLERS[key.trim().toLowerCase()];
  if (!handler) {
    return null;
  }
  const next = cloneConfig(ensureConfig());
  if (!handler.apply(next, value)) {
    return null;
  }
  if (next.project.min_sdk > next.project.target_sdk) {
    return null;
  }
  saveConfig(next);
  fs.mkdirSync(next.workspace.default_root, { recursive: true });
  return next;
}

export function resolveToolchainRoot(config: ForgeConfig): string {
  if (config.toolchain.root) {
    return config.toolchain.root;
  }
  return path.join(config.workspace.default_root, "toolchain");
}
