import fs from "fs";
import path from "path";
import { TemplateError, describeError } from "../errors";
import type { ProjectLanguage } from "../config";
import { getTemplatesRoot } from "../paths";
import { validateJson } from "../validation/validate";

export type TemplateDefinition = {
  name: string;
  description: string;
  languages: ProjectLanguage[];
  sourceDir: string;
  minSdkFloor?: number;
  // Lowest compileSdk the template's pinned libraries accept.
  compileSdkFloor?: number;
  defaults: Record<string, string>;
};

export type TemplateIndex = {
  templates: TemplateDefinition[];
};

export type SkeletonFile = {
  relativePath: string;
  absolutePath: string;
};

const PLACEHOLDER = /{{\s*([a-zA-Z0-9_]+)\s*}}/g;

export const BUILTIN_PLACEHOLDERS = [
  "project_name",
  "app_name",
  "package_name",
  "package_path",
  "min_sdk",
  "target_sdk",
  "compile_sdk",
  "build_tools_version"
] as const;

function isTemplateIndex(value: unknown): value is TemplateIndex {
  return typeof value === "object" && value !== null && "templates" in value && Array.isArray(value.templates);
}

export function templateIndexPath(root = getTemplatesRoot()): string {
  return path.join(root, "template-index.json");
}

export function loadTemplateIndex(root = getTemplatesRoot()): TemplateIndex {
  const indexPath = templateIndexPath(root);
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(indexPath, "utf-8"));
  } catch (error) {
    throw new TemplateError(`Cannot read template index ${indexPath}: ${describeError(error)}`);
  }
  const result = validateJson("template-index.schema.json", parsed);
  if (!result.valid || !isTemplateIndex(parsed)) {
    throw new TemplateError(`Invalid template index ${indexPath}: ${result.errors.join("; ")}`);
  }
  return parsed;
}

export function findTemplate(name: string, root = getTemplatesRoot()): TemplateDefinition {
  const index = loadTemplateIndex(root);
  const match = index.templates.find((entry) => entry.name === name);
  if (!match) {
    const known = index.templates.map((entry) => entry.name).join(", ");
    throw new TemplateError(`Unknown template: ${name} (available: ${known})`);
  }
  return match;
}

export function extractPlaceholders(template: string): string[] {
  const placeholders = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    placeholders.add(match[1]);
  }
  return Array.from(placeholders).sort();
}

export function renderTemplate(
  template: string,
  data: Record<string, string>,
  escape: (value: string) => string = (value) => value
): string {
  const missing = extractPlaceholders(template).filter((key) => !(key in data));
  if (missing.length > 0) {
    throw new TemplateError(`Unresolved placeholders: ${missing.join(", ")}`);
  }
  return template.replace(PLACEHOLDER, (_token, key: string) => escape(data[key]));
}

// Android string resources treat apostrophes and quotes as syntax.
export function escapeXmlResource(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/\\/g, "\\\\")
    .replace(/'/g, "\\'")
    .replace(/"/g, '\\"');
}

export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function walk(dir: string, prefix: string, out: SkeletonFile[]): void {
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const absolutePath = path.join(dir, entry.name);
    const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      walk(absolutePath, relativePath, out);
    } else if (entry.isFile()) {
      out.push({ relativePath, absolutePath });
    }
  }
}

export function listSkeletonFiles(dir: string): SkeletonFile[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  const files: SkeletonFile[] = [];
  walk(dir, "", files);
  return files.sort((a, b) => compareText(a.relativePath, b.relativePath));
}

export function skeletonDirs(template: TemplateDefinition, language: ProjectLanguage, root = getTemplatesRoot()): string[] {
  return [path.join(root, template.name, "common"), path.join(root, template.name, language)];
}
