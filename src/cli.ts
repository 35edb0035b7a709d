#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { Command } from "commander";
import { getRepoRoot } from "./paths";
import { setFlags } from "./context/flags";
import { configKeys, configPath, ensureConfig, updateConfigValue } from "./config";
import { printError } from "./errors";
import { runGenerate } from "./commands/generate";
import { runCreate } from "./commands/create";
import { runScaffold } from "./commands/scaffold";
import { runBuild } from "./commands/build";
import { runToolchainEnsure, runToolchainStatus } from "./commands/toolchain";
import { runTemplatesList, runTemplatesValidate } from "./commands/templates";
import { runDoctor } from "./commands/doctor";

const program = new Command();

function getVersion(): string {
  try {
    const pkgPath = path.join(getRepoRoot(), "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

program
  .name("apkforge")
  .description("Turn an app description into a debug APK: generate, scaffold, provision, build")
  .version(getVersion())
  .option("--non-interactive", "Never prompt; unaccepted licenses fail unless --accept-licenses is set")
  .option("--accept-licenses", "Record acceptance of SDK licenses required by the toolchain")
  .option("--project <name>", "Project name (defaults to one derived from the prompt)")
  .option("--output <path>", "Override workspace output root")
  .option("--provider <name>", "AI provider: gemini|codex|ollama|mock|auto")
  .option("--model <name>", "AI model id (for providers that support model override)")
  .option("--template <name>", "Project template id")
  .option("--language <lang>", "Source language: kotlin|java")
  .option("--min-sdk <n>", "Minimum Android SDK level")
  .option("--target-sdk <n>", "Target Android SDK level")
  .option("--max-debug-iterations <n>", "Maximum review/debug loops per task")
  .option("--build-timeout-seconds <n>", "Abort the build after this many seconds");

program.hook("preAction", (thisCommand, actionCommand) => {
  const config = ensureConfig();
  const opts =
    typeof actionCommand.optsWithGlobals === "function" ? actionCommand.optsWithGlobals() : thisCommand.opts();
  setFlags({
    nonInteractive: Boolean(opts.nonInteractive),
    acceptLicenses: Boolean(opts.acceptLicenses) || config.toolchain.accept_licenses,
    project: opts.project,
    output: opts.output,
    provider: typeof opts.provider === "string" ? opts.provider : config.ai.preferred_provider,
    model: typeof opts.model === "string" ? opts.model : config.ai.model,
    template: opts.template,
    language: opts.language,
    minSdk: opts.minSdk,
    targetSdk: opts.targetSdk,
    maxDebugIterations: opts.maxDebugIterations,
    buildTimeoutSeconds: opts.buildTimeoutSeconds
  });
});

program
  .command("create")
  .description("Generate code, scaffold a project, provision the toolchain and build a debug APK")
  .argument("[prompt...]", "App description")
  .action((prompt: string[]) => runCreate(prompt.join(" ").trim()));

program
  .command("generate")
  .description("Run the plan/code/review/debug agents and write the generated source")
  .argument("[prompt...]", "App description")
  .action((prompt: string[]) => runGenerate(prompt.join(" ").trim()));

program
  .command("scaffold")
  .description("Scaffold a project from a finished task's generated files")
  .argument("<task-dir>", "Task directory under <workspace>/tasks")
  .action((taskDir: string) => runScaffold(taskDir));

program
  .command("build")
  .description("Provision the toolchain if needed and build a debug APK")
  .argument("<project-dir>", "Scaffolded project directory")
  .action((projectDir: string) => runBuild(projectDir));

const toolchainCmd = program.command("toolchain").description("Local JDK, Android SDK and Gradle");
toolchainCmd
  .command("status")
  .description("Show installed components and license state")
  .action(() => runToolchainStatus());
toolchainCmd
  .command("ensure")
  .description("Install missing toolchain components")
  .action(() => runToolchainEnsure());

const templatesCmd = program
  .command("templates")
  .description("List project templates")
  .action(() => runTemplatesList());
templatesCmd
  .command("validate")
  .description("Check the template index and skeleton placeholders")
  .action(() => runTemplatesValidate());

program
  .command("doctor")
  .description("Validate config, templates and toolchain state")
  .action(() => runDoctor());

const configCmd = program.command("config").description("Configuration commands");
configCmd
  .command("show")
  .description("Show effective config and config file path")
  .action(() => {
    const config = ensureConfig();
    console.log(`Config file: ${configPath()}`);
    console.log(JSON.stringify(config, null, 2));
  });

configCmd
  .command("init")
  .description("Create config file with defaults if missing")
  .action(() => {
    const config = ensureConfig();
    console.log(`Config ready: ${configPath()}`);
    console.log(`Workspace default root: ${config.workspace.default_root}`);
  });

configCmd
  .command("set")
  .description("Set config value by key")
  .argument("<key>", "Key in section.field form, e.g. project.language")
  .argument("<value>", "Value for key")
  .action((key: string, value: string) => {
    const updated = updateConfigValue(key, value);
    if (!updated) {
      printError("AF-1506", `Invalid config key or value for '${key}'. Keys: ${configKeys().join(", ")}.`);
      process.exitCode = 1;
      return;
    }
    console.log(`Config updated: ${configPath()}`);
    console.log(JSON.stringify(updated, null, 2));
  });

const ai = program.command("ai").description("AI provider commands");
ai
  .command("status")
  .description("Check AI provider availability")
  .action(async () => {
    const { runAiStatus } = await import("./commands/ai-status");
    await runAiStatus();
  });

const knownTopLevel = new Set([
  "create",
  "generate",
  "scaffold",
  "build",
  "toolchain",
  "templates",
  "doctor",
  "config",
  "ai",
  "help"
]);

const valueFlags = new Set([
  "--project",
  "--output",
  "--provider",
  "--model",
  "--template",
  "--language",
  "--min-sdk",
  "--target-sdk",
  "--max-debug-iterations",
  "--build-timeout-seconds"
]);

export function normalizeArgv(argv: string[]): string[] {
  const passthrough = argv.slice(0, 2);
  const args = argv.slice(2);
  if (args.length === 0) {
    return argv;
  }
  let positionalIndex = -1;
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("-")) {
      positionalIndex = i;
      break;
    }
    if (valueFlags.has(token)) {
      i += 1;
    }
  }
  if (positionalIndex < 0) {
    return argv;
  }
  if (knownTopLevel.has(args[positionalIndex])) {
    return argv;
  }
  // apkforge "a tip calculator" runs the full chain
  return [...passthrough, ...args.slice(0, positionalIndex), "create", ...args.slice(positionalIndex)];
}

if (require.main === module) {
  program.parseAsync(normalizeArgv(process.argv)).catch((error: unknown) => {
    printError("AF-1000", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
