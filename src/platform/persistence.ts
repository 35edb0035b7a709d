import fs from "fs";
import path from "path";
import { FileSystemError, describeError } from "../errors";

export function ensureDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new FileSystemError(`Cannot create directory ${dir}: ${describeError(error)}`, dir);
  }
}

export function readJsonFile<T>(filePath: string): T | null {
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(raw) as T;
  } catch {
    return null;
  }
}

export function writeJsonAtomic(filePath: string, value: unknown): void {
  ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmp, `${JSON.stringify(value, null, 2)}\n`, "utf-8");
    fs.renameSync(tmp, filePath);
  } catch (error) {
    fs.rmSync(tmp, { force: true });
    throw new FileSystemError(`Cannot write ${filePath}: ${describeError(error)}`, filePath);
  }
}

export function writeTextFile(filePath: string, contents: string): void {
  try {
    ensureDir(path.dirname(filePath));
    fs.writeFileSync(filePath, contents, "utf-8");
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw new FileSystemError(`Cannot write ${filePath}: ${describeError(error)}`, filePath);
  }
}

export function isInside(root: string, candidate: string): boolean {
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(candidate);
  return resolved === resolvedRoot || resolved.startsWith(`${resolvedRoot}${path.sep}`);
}
