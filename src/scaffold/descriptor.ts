import { TemplateError } from "../errors";
import type { ProjectLanguage } from "../config";
import type { SdkLevels } from "../toolchain/catalog";
import type { TemplateDefinition } from "../templates/render";

export type ProjectDescriptor = {
  name: string;
  template: string;
  language: ProjectLanguage;
  minSdk: number;
  targetSdk: number;
  appName?: string;
  packageName?: string;
};

export type ResolvedDescriptor = {
  projectName: string;
  appName: string;
  packageName: string;
  packagePath: string;
  template: TemplateDefinition;
  language: ProjectLanguage;
  minSdk: number;
  targetSdk: number;
  compileSdk: number;
  buildToolsVersion: string;
};

export const FALLBACK_PROJECT_NAME = "AndroidProject";
const MAX_NAME_LENGTH = 50;
const PACKAGE_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z][a-z0-9_]*)+$/;
const NAME_STOP_WORDS = new Set(["a", "an", "the", "app", "application", "android", "create", "make", "build", "me", "that", "with", "for"]);

function trimSeparators(value: string): string {
  return value.replace(/^[._\-]+/, "").replace(/[._\-]+$/, "");
}

export function sanitizeProjectName(raw: string): string {
  const cleaned = trimSeparators(
    raw
      .trim()
      .replace(/\s+/g, "_")
      .replace(/[^\p{L}\p{N}_.\-]/gu, "")
      .replace(/\.{2,}/g, ".")
  );
  const truncated = trimSeparators(cleaned.slice(0, MAX_NAME_LENGTH));
  return truncated || FALLBACK_PROJECT_NAME;
}

export function deriveProjectName(prompt: string): string {
  const words = prompt
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word && !NAME_STOP_WORDS.has(word))
    .slice(0, 3);
  const pascal = words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join("");
  return sanitizeProjectName(pascal ? `${pascal}App` : FALLBACK_PROJECT_NAME);
}

export function derivePackageName(projectName: string): string {
  let suffix = projectName.toLowerCase().replace(/[^a-z0-9]/g, "");
  if (!suffix) {
    suffix = "app";
  } else if (/^[0-9]/.test(suffix)) {
    suffix = `app${suffix}`;
  }
  return `com.example.${suffix}`;
}

/** compileSdk never drops below the template's floor; build-tools follow the template's pin. */
export function sdkLevels(template: TemplateDefinition, targetSdk: number): SdkLevels {
  const compileSdk = Math.max(targetSdk, template.compileSdkFloor ?? targetSdk);
  return { compileSdk, buildToolsVersion: template.defaults.build_tools_version ?? `${compileSdk}.0.0` };
}

function requireSdk(label: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new TemplateError(`${label} must be a positive integer, got ${value}`);
  }
  return value;
}

export function resolveDescriptor(descriptor: ProjectDescriptor, template: TemplateDefinition): ResolvedDescriptor {
  if (!template.languages.includes(descriptor.language)) {
    throw new TemplateError(
      `Template ${template.name} does not support ${descriptor.language} (supported: ${template.languages.join(", ")})`
    );
  }
  const minSdk = requireSdk("minSdk", descriptor.minSdk);
  const targetSdk = requireSdk("targetSdk", descriptor.targetSdk);
  if (minSdk > targetSdk) {
    throw new TemplateError(`minSdk (${minSdk}) must not exceed targetSdk (${targetSdk})`);
  }
  if (template.minSdkFloor !== undefined && minSdk < template.minSdkFloor) {
    throw new TemplateError(`Template ${template.name} requires minSdk >= ${template.minSdkFloor}, got ${minSdk}`);
  }

  const projectName = sanitizeProjectName(descriptor.name);
  const packageName = descriptor.packageName?.trim() || derivePackageName(projectName);
  if (!PACKAGE_PATTERN.test(packageName)) {
    throw new TemplateError(`Invalid package name: ${packageName}`);
  }
  const appName = descriptor.appName?.trim() || projectName.replace(/_/g, " ");

  return {
    projectName,
    appName,
    packageName,
    packagePath: packageName.replace(/\./g, "/"),
    template,
    language: descriptor.language,
    minSdk,
    targetSdk,
    ...sdkLevels(template, targetSdk)
  };
}

export function placeholderValues(resolved: ResolvedDescriptor): Record<string, string> {
  return {
    ...resolved.template.defaults,
    project_name: resolved.projectName,
    app_name: resolved.appName,
    package_name: resolved.packageName,
    package_path: resolved.packagePath,
    min_sdk: String(resolved.minSdk),
    target_sdk: String(resolved.targetSdk),
    compile_sdk: String(resolved.compileSdk),
    build_tools_version: resolved.buildToolsVersion
  };
}
