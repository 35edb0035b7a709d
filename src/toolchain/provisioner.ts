import fs from "fs";
import path from "path";
import {
  CancelledError,
  LicenseGateError,
  ToolchainInstallError,
  describeError,
  isCancelled
} from "../errors";
import { ActivityLog, silentLog } from "../platform/activity-log";
import { FileLockOptions, Mutex, withFileLock } from "../platform/locks";
import { ensureDir } from "../platform/persistence";
import { SDK_DIR, ToolchainComponent, installDirFor } from "./catalog";
import { InstallOutcome, InstallerRegistry, defaultInstallers, isNonEmptyDir, runInstaller, sha256File } from "./installers";
import {
  InstalledComponent,
  LicenseAcceptance,
  ToolchainState,
  findSatisfying,
  hasLicense,
  loadState,
  saveState,
  withInstalled,
  withLicense
} from "./state";

export type ProvisionerOptions = {
  root: string;
  installers?: InstallerRegistry;
  acceptLicenses: boolean;
  /** Asked for each license not yet accepted when `acceptLicenses` is off. */
  confirmLicense?: LicenseConfirmation;
  maxAttempts?: number;
  log?: ActivityLog;
  lock?: Omit<FileLockOptions, "signal">;
  now?: () => Date;
};

export type LicenseConfirmation = (license: string, componentId: string) => Promise<boolean>;

export type EnsureOptions = {
  signal?: AbortSignal;
};

export type ComponentStatus = {
  component: ToolchainComponent;
  installed: InstalledComponent | null;
  licenseAccepted: boolean;
};

const DEFAULT_MAX_ATTEMPTS = 3;
export const LOCK_FILE = ".provision.lock";

type Verified = Pick<InstalledComponent, "sizeBytes" | "sha256">;

export class ToolchainProvisioner {
  readonly root: string;
  private readonly installers: InstallerRegistry;
  private readonly acceptLicenses: boolean;
  private readonly confirmLicense?: LicenseConfirmation;
  private readonly maxAttempts: number;
  private readonly log: ActivityLog;
  private readonly lockOptions: Omit<FileLockOptions, "signal">;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();

  constructor(options: ProvisionerOptions) {
    this.root = path.resolve(options.root);
    this.installers = options.installers ?? defaultInstallers();
    this.acceptLicenses = options.acceptLicenses;
    this.confirmLicense = options.confirmLicense;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.log = options.log ?? silentLog;
    this.lockOptions = options.lock ?? {};
    this.now = options.now ?? (() => new Date());
  }

  status(components: ToolchainComponent[]): ComponentStatus[] {
    const state = loadState(this.root);
    return components.map((component) => ({
      component,
      installed: findSatisfying(state, component.id, component.version),
      licenseAccepted: !component.license || hasLicense(state, component.license)
    }));
  }

  /**
   * Installs whatever in `components` is missing, in order, and returns the resulting state.
   * Calls are serialized per instance and across processes sharing the same root.
   */
  ensureReady(components: ToolchainComponent[], options: EnsureOptions = {}): Promise<ToolchainState> {
    return this.mutex.runExclusive(() =>
      withFileLock(path.join(this.root, LOCK_FILE), () => this.provision(components, options.signal), {
        ...this.lockOptions,
        signal: options.signal
      })
    );
  }

  private async provision(components: ToolchainComponent[], signal?: AbortSignal): Promise<ToolchainState> {
    let state = loadState(this.root);
    const missing = components.filter((component) => !findSatisfying(state, component.id, component.version));
    if (missing.length === 0) {
      this.log(`Toolchain ready under ${this.root} (${components.length} components)`);
      return state;
    }

    state = await this.gateLicenses(state, missing);
    for (const component of missing) {
      if (signal?.aborted) {
        throw new CancelledError("Toolchain provisioning cancelled");
      }
      state = await this.install(state, component, signal);
    }
    return state;
  }

  private async gateLicenses(state: ToolchainState, components: ToolchainComponent[]): Promise<ToolchainState> {
    let next = state;
    for (const component of components) {
      const license = component.license;
      if (!license || hasLicense(next, license)) {
        continue;
      }
      let method: LicenseAcceptance["method"] = "non-interactive";
      if (!this.acceptLicenses) {
        if (!this.confirmLicense || !(await this.confirmLicense(license, component.id))) {
          throw new LicenseGateError(
            `License ${license} for ${component.id} has not been accepted. Re-run with --accept-licenses.`,
            license
          );
        }
        method = "interactive";
      }
      next = withLicense(next, {
        id: license,
        component: component.id,
        acceptedAt: this.now().toISOString(),
        method
      });
      saveState(next);
      this.log(`Accepted license ${license} for ${component.id} (${method})`);
    }
    return next;
  }

  private async install(state: ToolchainState, component: ToolchainComponent, signal?: AbortSignal): Promise<ToolchainState> {
    const stagingDir = path.join(this.root, ".staging", `${component.id}@${component.version}`);
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      fs.rmSync(stagingDir, { recursive: true, force: true });
      ensureDir(stagingDir);
      try {
        this.log(`Installing ${component.id} ${component.version} (attempt ${attempt}/${this.maxAttempts})`);
        const outcome = await runInstaller(this.installers, { component, stagingDir, state, signal, log: this.log });
        if (signal?.aborted) {
          throw new CancelledError(`Installing ${component.id} cancelled`);
        }
        const verified = await this.verify(component, outcome);
        const finalPath = path.join(this.root, installDirFor(component));
        fs.rmSync(finalPath, { recursive: true, force: true });
        ensureDir(path.dirname(finalPath));
        fs.renameSync(outcome.contentDir, finalPath);
        this.mergeLicenses(outcome);
        const next = withInstalled(state, {
          id: component.id,
          version: component.version,
          path: finalPath,
          ...verified,
          installedAt: this.now().toISOString()
        });
        saveState(next);
        this.log(`Installed ${component.id} ${component.version} at ${finalPath}`);
        return next;
      } catch (error) {
        if (isCancelled(error) || signal?.aborted) {
          throw error instanceof CancelledError ? error : new CancelledError(`Installing ${component.id} cancelled`);
        }
        lastError = error;
        this.log(`Install of ${component.id} failed on attempt ${attempt}: ${describeError(error)}`);
      } finally {
        fs.rmSync(stagingDir, { recursive: true, force: true });
      }
    }
    throw new ToolchainInstallError(
      `Failed to install ${component.id} ${component.version} after ${this.maxAttempts} attempts: ${describeError(lastError)}`,
      component.id
    );
  }

  private mergeLicenses(outcome: InstallOutcome): void {
    if (!outcome.licensesDir || !isNonEmptyDir(outcome.licensesDir)) {
      return;
    }
    const target = path.join(this.root, SDK_DIR, "licenses");
    ensureDir(target);
    fs.cpSync(outcome.licensesDir, target, { recursive: true, force: true });
  }

  private async verify(component: ToolchainComponent, outcome: InstallOutcome): Promise<Verified> {
    if (!isNonEmptyDir(outcome.contentDir)) {
      throw new ToolchainInstallError(`${component.id} produced no files`, component.id);
    }
    if (component.kind !== "archive" || !outcome.artifact) {
      return {};
    }
    const { sizeBytes, sha256 } = component.source;
    const actualSize = fs.statSync(outcome.artifact).size;
    if (sizeBytes !== undefined && actualSize !== sizeBytes) {
      throw new ToolchainInstallError(`${component.id} size mismatch: expected ${sizeBytes}, got ${actualSize}`, component.id);
    }
    const actualHash = await sha256File(outcome.artifact);
    if (sha256 !== undefined && actualHash !== sha256.toLowerCase()) {
      throw new ToolchainInstallError(`${component.id} checksum mismatch: expected ${sha256}, got ${actualHash}`, component.id);
    }
    return { sizeBytes: actualSize, sha256: actualHash };
  }
}
