import fs from "fs";
import path from "path";
import { describeError } from "../errors";
import { getTemplatesRoot } from "../paths";
import type { ValidationResult } from "../validation/validate";
import { BUILTIN_PLACEHOLDERS, TemplateIndex, extractPlaceholders, listSkeletonFiles, loadTemplateIndex } from "./render";

export function validateTemplates(root = getTemplatesRoot()): ValidationResult {
  const errors: string[] = [];
  let index: TemplateIndex;
  try {
    index = loadTemplateIndex(root);
  } catch (error) {
    return { valid: false, errors: [describeError(error)] };
  }

  for (const entry of index.templates) {
    const known = new Set<string>([...BUILTIN_PLACEHOLDERS, ...Object.keys(entry.defaults)]);
    const commonDir = path.join(root, entry.name, "common");
    if (!fs.existsSync(commonDir)) {
      errors.push(`Template ${entry.name} is missing its skeleton directory: ${commonDir}`);
    }
    for (const language of entry.languages) {
      const languageDir = path.join(root, entry.name, language);
      if (!fs.existsSync(languageDir)) {
        errors.push(`Template ${entry.name} is missing its ${language} directory: ${languageDir}`);
      }
    }
    for (const unknown of extractPlaceholders(entry.sourceDir).filter((key) => !known.has(key))) {
      errors.push(`Template ${entry.name} sourceDir uses unknown placeholder: ${unknown}`);
    }

    const dirs = [commonDir, ...entry.languages.map((language) => path.join(root, entry.name, language))];
    for (const dir of dirs) {
      for (const file of listSkeletonFiles(dir)) {
        const content = fs.readFileSync(file.absolutePath, "utf-8");
        const placeholders = extractPlaceholders(`${file.relativePath}\n${content}`);
        for (const unknown of placeholders.filter((key) => !known.has(key))) {
          errors.push(`Template ${entry.name} file ${path.relative(root, file.absolutePath)} uses unknown placeholder: ${unknown}`);
        }
      }
    }
  }

  return { valid: errors.length === 0, errors };
}
