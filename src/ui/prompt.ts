import readline from "readline";
import { getFlags } from "../context/flags";

export function canPrompt(): boolean {
  if (getFlags().nonInteractive || process.env.APKF_NON_INTERACTIVE === "1") {
    return false;
  }
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export function ask(question: string): Promise<string> {
  if (!canPrompt()) {
    return Promise.resolve("");
  }
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function confirm(question: string): Promise<boolean> {
  const normalized = (await ask(question)).toLowerCase();
  return normalized === "y" || normalized === "yes";
}
