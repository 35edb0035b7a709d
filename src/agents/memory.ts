import type { AgentRole } from "./roles";

export type MemoryEntry = Readonly<{
  index: number;
  role: AgentRole;
  text: string;
}>;

export type MemorySnapshot = ReadonlyArray<MemoryEntry>;

export class MemoryLog {
  private readonly entries: MemoryEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  append(role: AgentRole, text: string): MemoryEntry {
    const entry: MemoryEntry = Object.freeze({ index: this.entries.length, role, text });
    this.entries.push(entry);
    return entry;
  }

  snapshot(): MemorySnapshot {
    return Object.freeze([...this.entries]);
  }
}

export function renderMemory(memory: MemorySnapshot, maxChars = 6000): string {
  if (memory.length === 0) {
    return "";
  }
  const blocks = memory.map((entry) => `[${entry.index}] ${entry.role.toUpperCase()}:\n${entry.text.trim()}`);
  let text = blocks.join("\n\n");
  if (text.length > maxChars) {
    text = `...[earlier memory truncated]\n${text.slice(text.length - maxChars)}`;
  }
  return text;
}
