import { ToolchainState } from "../toolchain/state";
import { ToolchainComponent, defaultComponents } from "../toolchain/catalog";
import { sdkLevels } from "../scaffold/descriptor";
import { findTemplate } from "../templates/render";
import { LicenseConfirmation, ToolchainProvisioner } from "../toolchain/provisioner";
import { canPrompt, confirm } from "../ui/prompt";
import { Runtime, handleInterrupt, reportFailure, resolveRuntime } from "./runtime";

/** Asks on the terminal unless --non-interactive is set or there is no terminal. */
export function licenseConfirmation(): LicenseConfirmation | undefined {
  if (!canPrompt()) {
    return undefined;
  }
  return (license, componentId) => confirm(`Accept license ${license} required by ${componentId}? [y/N] `);
}

/** The SDK packages follow the levels the configured template will compile against. */
export function requiredComponents(runtime: Pick<Runtime, "template" | "targetSdk">): ToolchainComponent[] {
  return defaultComponents(sdkLevels(findTemplate(runtime.template), runtime.targetSdk));
}

export function createProvisioner(runtime: Runtime): ToolchainProvisioner {
  return new ToolchainProvisioner({
    root: runtime.toolchainRoot,
    acceptLicenses: runtime.acceptLicenses,
    confirmLicense: licenseConfirmation(),
    log: (message) => {
      runtime.log(message);
      console.log(message);
    }
  });
}

export async function ensureToolchain(runtime: Runtime): Promise<ToolchainState> {
  const provisioner = createProvisioner(runtime);
  const controller = new AbortController();
  const dispose = handleInterrupt(() => controller.abort());
  try {
    return await provisioner.ensureReady(requiredComponents(runtime), { signal: controller.signal });
  } finally {
    dispose();
  }
}

export function runToolchainStatus(): void {
  const runtime = resolveRuntime();
  if (!runtime) {
    process.exitCode = 1;
    return;
  }
  try {
    const statuses = createProvisioner(runtime).status(requiredComponents(runtime));
    console.log(`Toolchain root: ${runtime.toolchainRoot}`);
    for (const status of statuses) {
      const { component, installed } = status;
      const state = installed ? `installed ${installed.version} at ${installed.path}` : "missing";
      const license = component.license ? ` license ${component.license}: ${status.licenseAccepted ? "accepted" : "pending"}` : "";
      console.log(`- ${component.id} (>= ${component.version}): ${state}${license}`);
    }
  } catch (error) {
    reportFailure(error, runtime.log);
  }
}

export async function runToolchainEnsure(): Promise<void> {
  const runtime = resolveRuntime();
  if (!runtime) {
    process.exitCode = 1;
    return;
  }
  try {
    const state = await ensureToolchain(runtime);
    console.log(`Toolchain ready: ${state.installed.length} component record(s) under ${state.root}`);
  } catch (error) {
    reportFailure(error, runtime.log);
  }
}
