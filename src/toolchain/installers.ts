import crypto from "crypto";
import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import { request } from "undici";
import { CancelledError, ToolchainInstallError, describeError } from "../errors";
import { ActivityLog } from "../platform/activity-log";
import { ensureDir } from "../platform/persistence";
import { ProcessLauncher, runProcess } from "../platform/process-exec";
import { ArchiveComponent, CMDLINE_TOOLS_ID, SdkPackageComponent, ToolchainComponent, sdkPackagePath } from "./catalog";
import { javaHome, sdkmanagerBinary, sdkRoot } from "./env";
import { ToolchainState, latestInstalled } from "./state";

export type InstallContext<C extends ToolchainComponent = ToolchainComponent> = {
  component: C;
  stagingDir: string;
  state: ToolchainState;
  signal?: AbortSignal;
  log: ActivityLog;
};

export type InstallOutcome = {
  // Directory holding the component's files; moved into place by the provisioner.
  contentDir: string;
  // Downloaded file checked against the component's declared size and digest.
  artifact?: string;
  // License files written by sdkmanager; merged into the SDK's licenses/ on commit.
  licensesDir?: string;
};

export type ComponentInstaller<C extends ToolchainComponent = ToolchainComponent> = {
  install: (context: InstallContext<C>) => Promise<InstallOutcome>;
};

export type InstallerRegistry = {
  archive: ComponentInstaller<ArchiveComponent>;
  "sdk-package": ComponentInstaller<SdkPackageComponent>;
};

export type InstallerSettings = {
  launch?: ProcessLauncher;
  downloadTimeoutMs?: number;
};

const DEFAULT_DOWNLOAD_TIMEOUT_MS = 10 * 60 * 1000;

export async function sha256File(filePath: string): Promise<string> {
  const hash = crypto.createHash("sha256");
  await pipeline(fs.createReadStream(filePath), hash);
  return hash.digest("hex");
}

export function isNonEmptyDir(dir: string): boolean {
  try {
    return fs.readdirSync(dir).length > 0;
  } catch {
    return false;
  }
}

export async function downloadFile(url: string, destination: string, signal?: AbortSignal, timeoutMs = DEFAULT_DOWNLOAD_TIMEOUT_MS): Promise<void> {
  ensureDir(path.dirname(destination));
  const { statusCode, body } = await request(url, {
    method: "GET",
    signal,
    maxRedirections: 5,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs
  });
  if (statusCode >= 400) {
    await body.dump();
    throw new ToolchainInstallError(`Download failed (HTTP ${statusCode}): ${url}`);
  }
  await pipeline(body, fs.createWriteStream(destination));
}

// Archives that wrap everything in one top-level folder (jdk-17.x, gradle-8.7, cmdline-tools) are unwrapped.
function unwrapSingleDir(dir: string): string {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  if (entries.length === 1 && entries[0].isDirectory()) {
    return path.join(dir, entries[0].name);
  }
  return dir;
}

function archiveName(component: ArchiveComponent): string {
  const extension = component.source.format === "zip" ? "zip" : "tar.gz";
  return `${component.id}-${component.version}.${extension}`;
}

export function createArchiveInstaller(settings: InstallerSettings = {}): ComponentInstaller<ArchiveComponent> {
  return {
    install: async ({ component, stagingDir, signal, log }) => {
      const artifact = path.join(stagingDir, "download", archiveName(component));
      log(`Downloading ${component.id} ${component.version} from ${component.source.url}`);
      try {
        await downloadFile(component.source.url, artifact, signal, settings.downloadTimeoutMs);
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError(`Download of ${component.id} cancelled`);
        }
        if (error instanceof ToolchainInstallError) {
          throw error;
        }
        throw new ToolchainInstallError(`Download of ${component.id} failed: ${describeError(error)}`, component.id);
      }

      const extractDir = path.join(stagingDir, "content");
      ensureDir(extractDir);
      const useUnzip = component.source.format === "zip" && process.platform !== "win32";
      const [command, args]: [string, string[]] = useUnzip
        ? ["unzip", ["-q", "-o", artifact, "-d", extractDir]]
        : ["tar", [component.source.format === "zip" ? "-xf" : "-xzf", artifact, "-C", extractDir]];
      const outcome = await runProcess(command, args, { signal, launch: settings.launch });
      if (outcome.aborted) {
        throw new CancelledError(`Extraction of ${component.id} cancelled`);
      }
      if (outcome.error || outcome.code !== 0) {
        const reason = outcome.error ? describeError(outcome.error) : `exit code ${outcome.code}`;
        throw new ToolchainInstallError(`Extracting ${component.id} with ${command} failed: ${reason}`, component.id);
      }
      return { contentDir: unwrapSingleDir(extractDir), artifact };
    }
  };
}

export function createSdkPackageInstaller(settings: InstallerSettings = {}): ComponentInstaller<SdkPackageComponent> {
  return {
    install: async ({ component, stagingDir, state, signal, log }) => {
      if (!latestInstalled(state, CMDLINE_TOOLS_ID)) {
        throw new ToolchainInstallError(`${component.id} needs ${CMDLINE_TOOLS_ID} installed first`, component.id);
      }
      const sdkmanager = sdkmanagerBinary(sdkRoot(state));
      const pkg = component.source.package;
      log(`Installing SDK package ${pkg} via ${sdkmanager}`);
      const output: string[] = [];
      const outcome = await runProcess(sdkmanager, [`--sdk_root=${stagingDir}`, pkg], {
        env: { ...process.env, JAVA_HOME: javaHome(state) },
        shell: process.platform === "win32",
        // Licenses were recorded before this point; answer sdkmanager's prompts.
        input: "y\n".repeat(20),
        signal,
        launch: settings.launch,
        onStdout: (chunk) => output.push(chunk),
        onStderr: (chunk) => output.push(chunk)
      });
      if (outcome.aborted) {
        throw new CancelledError(`Installing ${pkg} cancelled`);
      }
      if (outcome.error || outcome.code !== 0) {
        const tail = output.join("").trim().split(/\r?\n/).slice(-5).join(" | ");
        const reason = outcome.error ? describeError(outcome.error) : `exit code ${outcome.code}`;
        throw new ToolchainInstallError(`sdkmanager ${pkg} failed (${reason}): ${tail}`, component.id);
      }
      return { contentDir: path.join(stagingDir, sdkPackagePath(pkg)), licensesDir: path.join(stagingDir, "licenses") };
    }
  };
}

export function defaultInstallers(settings: InstallerSettings = {}): InstallerRegistry {
  return {
    archive: createArchiveInstaller(settings),
    "sdk-package": createSdkPackageInstaller(settings)
  };
}

export function runInstaller(
  installers: InstallerRegistry,
  context: InstallContext
): Promise<InstallOutcome> {
  const { component } = context;
  if (component.kind === "archive") {
    return installers.archive.install({ ...context, component });
  }
  return installers["sdk-package"].install({ ...context, component });
}
