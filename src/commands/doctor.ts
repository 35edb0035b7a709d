import fs from "fs";
import { configPath, loadConfig, resolveToolchainRoot } from "../config";
import { describeError, printError } from "../errors";
import { validateTemplates } from "../templates/validate";
import { loadState, statePath } from "../toolchain/state";

export function runDoctor(): void {
  let failures = 0;
  const fail = (code: string, message: string) => {
    failures += 1;
    printError(code, message);
  };

  const file = configPath();
  const config = loadConfig();
  console.log(fs.existsSync(file) ? `Config: ${file}` : `Config: defaults (no file at ${file})`);
  if (config.project.min_sdk > config.project.target_sdk) {
    fail("AF-1506", `project.min_sdk (${config.project.min_sdk}) exceeds project.target_sdk (${config.project.target_sdk})`);
  }

  const templates = validateTemplates();
  if (templates.valid) {
    console.log("Templates: ok");
  } else {
    templates.errors.forEach((error) => fail("AF-4001", error));
  }

  const root = resolveToolchainRoot(config);
  try {
    const state = loadState(root);
    const source = fs.existsSync(statePath(root)) ? statePath(root) : "not provisioned yet";
    console.log(`Toolchain state: ${source} (${state.installed.length} installed, ${state.licenses.length} licenses)`);
  } catch (error) {
    fail("AF-5001", describeError(error));
  }

  if (failures > 0) {
    console.log(`Doctor found ${failures} problem(s).`);
    process.exitCode = 1;
    return;
  }
  console.log("Doctor: all checks passed.");
}
