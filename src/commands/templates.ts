import { getTemplatesRoot } from "../paths";
import { loadTemplateIndex } from "../templates/render";
import { validateTemplates } from "../templates/validate";
import { printError } from "../errors";
import { reportFailure } from "./runtime";

export function runTemplatesList(): void {
  try {
    const index = loadTemplateIndex();
    console.log(`Templates (${getTemplatesRoot()}):`);
    for (const template of index.templates) {
      console.log(`- ${template.name} [${template.languages.join(", ")}]: ${template.description}`);
    }
  } catch (error) {
    reportFailure(error);
  }
}

export function runTemplatesValidate(): void {
  const result = validateTemplates();
  if (!result.valid) {
    for (const error of result.errors) {
      printError("AF-4001", error);
    }
    process.exitCode = 1;
    return;
  }
  console.log("Templates valid.");
}
