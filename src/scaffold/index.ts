import fs from "fs";
import path from "path";
import { FileSystemError, TemplateError, describeError } from "../errors";
import { EventSink, progress } from "../agents/events";
import { ensureDir, isInside, writeTextFile } from "../platform/persistence";
import { getTemplatesRoot } from "../paths";
import {
  compareText,
  escapeXmlResource,
  findTemplate,
  listSkeletonFiles,
  renderTemplate,
  skeletonDirs
} from "../templates/render";
import { ProjectDescriptor, ResolvedDescriptor, placeholderValues, resolveDescriptor } from "./descriptor";

export type GeneratedFile = {
  name: string;
  contents: string;
};

export type ScaffoldOptions = {
  templatesRoot?: string;
};

type PlannedFile = {
  contents: string;
  origin: "template" | "generated";
};

const SOURCE_EXTENSIONS = new Set([".kt", ".java"]);

function toPosix(value: string): string {
  return value.split(path.sep).join("/");
}

export function applyPackage(contents: string, fileName: string, packageName: string): string {
  const ext = path.extname(fileName);
  if (!SOURCE_EXTENSIONS.has(ext)) {
    return contents;
  }
  const declaration = ext === ".java" ? `package ${packageName};` : `package ${packageName}`;
  const existing = /^[ \t]*package\s+[\w.]+[ \t]*;?[ \t]*$/m;
  if (existing.test(contents)) {
    return contents.replace(existing, declaration);
  }
  return `${declaration}\n\n${contents.replace(/^\s+/, "")}`;
}

function ensureTrailingNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}

function planSkeleton(resolved: ResolvedDescriptor, values: Record<string, string>, templatesRoot: string): Map<string, PlannedFile> {
  const plan = new Map<string, PlannedFile>();
  for (const dir of skeletonDirs(resolved.template, resolved.language, templatesRoot)) {
    for (const file of listSkeletonFiles(dir)) {
      const relativePath = renderTemplate(file.relativePath, values);
      let raw: string;
      try {
        raw = fs.readFileSync(file.absolutePath, "utf-8");
      } catch (error) {
        throw new FileSystemError(`Cannot read template file ${file.absolutePath}: ${describeError(error)}`, file.absolutePath);
      }
      const escape = relativePath.endsWith(".xml") ? escapeXmlResource : undefined;
      let contents: string;
      try {
        contents = renderTemplate(raw, values, escape);
      } catch (error) {
        if (error instanceof TemplateError) {
          throw new TemplateError(`${error.message} in ${resolved.template.name}/${file.relativePath}`);
        }
        throw error;
      }
      plan.set(relativePath, { contents, origin: "template" });
    }
  }
  return plan;
}

function generatedTarget(file: GeneratedFile, sourceDir: string): string {
  return toPosix(path.normalize(`${sourceDir}/${file.name}`)).replace(/^\/+/, "");
}

/**
 * Materializes a template plus generated sources under `<destinationRoot>/<project name>`.
 * Re-running with the same inputs rewrites nothing and yields the same tree.
 */
export function scaffold(
  descriptor: ProjectDescriptor,
  generatedFiles: GeneratedFile[],
  destinationRoot: string,
  onEvent?: EventSink,
  options: ScaffoldOptions = {}
): string {
  const templatesRoot = options.templatesRoot ?? getTemplatesRoot();
  const template = findTemplate(descriptor.template, templatesRoot);
  const resolved = resolveDescriptor(descriptor, template);
  const values = placeholderValues(resolved);
  const plan = planSkeleton(resolved, values, templatesRoot);
  const sourceDir = renderTemplate(template.sourceDir, values);

  for (const file of generatedFiles) {
    const target = generatedTarget(file, sourceDir);
    if (plan.get(target)?.origin === "template") {
      onEvent?.(progress(`Generated file overrides template file: ${target}`));
    }
    const contents = ensureTrailingNewline(applyPackage(file.contents, target, resolved.packageName));
    plan.set(target, { contents, origin: "generated" });
  }

  const projectRoot = path.resolve(destinationRoot, resolved.projectName);
  const entries = Array.from(plan.entries()).sort(([a], [b]) => compareText(a, b));
  for (const [relativePath] of entries) {
    const target = path.resolve(projectRoot, relativePath);
    if (!isInside(projectRoot, target) || target === projectRoot) {
      throw new FileSystemError(`Refusing to write outside the project root: ${relativePath}`, target);
    }
  }

  ensureDir(projectRoot);
  for (const [relativePath, file] of entries) {
    const target = path.resolve(projectRoot, relativePath);
    if (fs.existsSync(target) && fs.readFileSync(target, "utf-8") === file.contents) {
      continue;
    }
    writeTextFile(target, file.contents);
  }
  return projectRoot;
}
