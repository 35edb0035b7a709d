export type AgentEvent =
  | { kind: "progress"; message: string }
  | { kind: "output_file"; path: string }
  | { kind: "advisory"; message: string }
  | { kind: "done"; summary: string }
  | { kind: "error"; message: string; code: string }
  | { kind: "cancelled"; message: string };

export type EventSink = (event: AgentEvent) => void;

export type TerminalStatus = "done" | "error" | "cancelled";

export const progress = (message: string): AgentEvent => ({ kind: "progress", message });
export const outputFile = (path: string): AgentEvent => ({ kind: "output_file", path });
export const advisory = (message: string): AgentEvent => ({ kind: "advisory", message });
export const done = (summary: string): AgentEvent => ({ kind: "done", summary });
export const failed = (message: string, code: string): AgentEvent => ({ kind: "error", message, code });
export const cancelled = (message: string): AgentEvent => ({ kind: "cancelled", message });

export function describeEvent(event: AgentEvent): string {
  switch (event.kind) {
    case "progress":
      return `... ${event.message}`;
    case "output_file":
      return `Wrote ${event.path}`;
    case "advisory":
      return `! ${event.message}`;
    case "done":
      return `Done: ${event.summary}`;
    case "error":
      return `[${event.code}] ${event.message}`;
    case "cancelled":
      return `Cancelled: ${event.message}`;
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}
