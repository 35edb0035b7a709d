import fs from "fs";
import path from "path";

export const DEBUG_APK_DIR = path.join("app", "build", "outputs", "apk", "debug");

/** Newest `*.apk` in the debug output directory, as an absolute path. */
export function findDebugApk(projectRoot: string): string | null {
  const dir = path.resolve(projectRoot, DEBUG_APK_DIR);
  let names: string[];
  try {
    names = fs.readdirSync(dir);
  } catch {
    return null;
  }
  let newest: { file: string; mtimeMs: number } | null = null;
  for (const name of names.filter((entry) => entry.endsWith(".apk")).sort()) {
    const file = path.join(dir, name);
    const stats = fs.statSync(file);
    if (!stats.isFile()) {
      continue;
    }
    if (!newest || stats.mtimeMs > newest.mtimeMs) {
      newest = { file, mtimeMs: stats.mtimeMs };
    }
  }
  return newest ? newest.file : null;
}

export function nextBuildLogPath(projectRoot: string): string {
  const dir = path.resolve(projectRoot, "build-logs");
  let highest = 0;
  if (fs.existsSync(dir)) {
    for (const name of fs.readdirSync(dir)) {
      const match = /^build-(\d+)\.log$/.exec(name);
      if (match) {
        highest = Math.max(highest, Number(match[1]));
      }
    }
  }
  return path.join(dir, `build-${highest + 1}.log`);
}
