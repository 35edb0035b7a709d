import fs from "fs";
import path from "path";
import { FileSystemError } from "../errors";
import { isInside, writeTextFile } from "../platform/persistence";

export type OutputWriter = {
  readonly root: string;
  write: (fileName: string, contents: string) => string;
  remove: (fileName: string) => void;
};

export function createOutputWriter(taskDir: string): OutputWriter {
  const root = path.resolve(taskDir, "generated");
  const resolveTarget = (fileName: string): string => {
    const target = path.resolve(root, fileName);
    if (!fileName.trim() || !isInside(root, target) || target === root) {
      throw new FileSystemError(`Refusing to write outside the task output directory: ${fileName}`, target);
    }
    return target;
  };
  return {
    root,
    write: (fileName, contents) => {
      const target = resolveTarget(fileName);
      writeTextFile(target, contents);
      return target;
    },
    remove: (fileName) => {
      fs.rmSync(resolveTarget(fileName), { force: true });
    }
  };
}
