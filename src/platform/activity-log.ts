import fs from "fs";
import path from "path";

export type ActivityLog = (message: string) => void;

function timestamp(date: Date): string {
  return date.toISOString().replace("T", " ").replace(/\.\d+Z$/, "");
}

export function createActivityLog(filePath: string): ActivityLog {
  let ready = false;
  return (message: string) => {
    const line = `${timestamp(new Date())} ${message}`;
    try {
      if (!ready) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        ready = true;
      }
      fs.appendFileSync(filePath, `${line}\n`, "utf-8");
    } catch {
      // the activity log never fails the operation it describes
    }
  };
}

export const silentLog: ActivityLog = () => undefined;
