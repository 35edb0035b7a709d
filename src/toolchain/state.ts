import fs from "fs";
import path from "path";
import { ToolchainInstallError, describeError } from "../errors";
import { writeJsonAtomic } from "../platform/persistence";
import { validateJson } from "../validation/validate";
import { compareVersions, satisfiesVersion } from "./versions";

export type InstalledComponent = {
  id: string;
  version: string;
  path: string;
  sizeBytes?: number;
  sha256?: string;
  installedAt: string;
};

export type LicenseAcceptance = {
  id: string;
  component: string;
  acceptedAt: string;
  method: "non-interactive" | "interactive";
};

export type ToolchainState = {
  version: 1;
  root: string;
  installed: InstalledComponent[];
  licenses: LicenseAcceptance[];
};

export const STATE_FILE = "toolchain-state.json";

export function statePath(root: string): string {
  return path.join(root, STATE_FILE);
}

export function emptyState(root: string): ToolchainState {
  return { version: 1, root: path.resolve(root), installed: [], licenses: [] };
}

function isState(value: unknown): value is Omit<ToolchainState, "root"> & { root?: string } {
  return (
    typeof value === "object" &&
    value !== null &&
    "installed" in value &&
    Array.isArray(value.installed) &&
    "licenses" in value &&
    Array.isArray(value.licenses)
  );
}

export function loadState(root: string): ToolchainState {
  const filePath = statePath(root);
  if (!fs.existsSync(filePath)) {
    return emptyState(root);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ToolchainInstallError(`Toolchain state ${filePath} is unreadable: ${describeError(error)}`);
  }
  const result = validateJson("toolchain-state.schema.json", parsed);
  if (!result.valid || !isState(parsed)) {
    throw new ToolchainInstallError(`Toolchain state ${filePath} is invalid: ${result.errors.join("; ")}`);
  }
  return { ...parsed, version: 1, root: path.resolve(root) };
}

export function saveState(state: ToolchainState): void {
  writeJsonAtomic(statePath(state.root), state);
}

/** Highest installed record of `id`, ignoring records whose directory has gone missing. */
export function latestInstalled(state: ToolchainState, id: string): InstalledComponent | null {
  let best: InstalledComponent | null = null;
  for (const record of state.installed) {
    if (record.id !== id || !fs.existsSync(record.path)) {
      continue;
    }
    if (!best || compareVersions(record.version, best.version) > 0) {
      best = record;
    }
  }
  return best;
}

export function findSatisfying(state: ToolchainState, id: string, required: string): InstalledComponent | null {
  const record = latestInstalled(state, id);
  return record && satisfiesVersion(record.version, required) ? record : null;
}

export function hasLicense(state: ToolchainState, licenseId: string): boolean {
  return state.licenses.some((entry) => entry.id === licenseId);
}

export function withLicense(state: ToolchainState, acceptance: LicenseAcceptance): ToolchainState {
  if (hasLicense(state, acceptance.id)) {
    return state;
  }
  return { ...state, licenses: [...state.licenses, acceptance] };
}

// Records whose directory has vanished are dropped so a reinstall can replace them.
export function withInstalled(state: ToolchainState, record: InstalledComponent): ToolchainState {
  const others = state.installed.filter(
    (entry) => !(entry.id === record.id && (entry.version === record.version || !fs.existsSync(entry.path)))
  );
  if (others.some((entry) => entry.id === record.id && compareVersions(entry.version, record.version) > 0)) {
    return state;
  }
  return { ...state, installed: [...others, record] };
}
