import { sleep } from "../agents/retry";
import { ROLE_LABELS } from "../agents/roles";
import { AIProvider, CompletionOptions, InferenceRequest } from "./types";

function literal(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"').replace(/\$/g, "\\$").replace(/\r?\n/g, " ");
}

function wantsJava(req: InferenceRequest): boolean {
  return /\bJava\b/.test(req.systemPrompt ?? "");
}

function sampleActivity(req: InferenceRequest): string {
  const title = literal(req.userPrompt.split("\n")[0].slice(0, 60));
  if (wantsJava(req)) {
    return [
      "```java",
      "import android.os.Bundle;",
      "import android.widget.TextView;",
      "import androidx.appcompat.app.AppCompatActivity;",
      "",
      "public class MainActivity extends AppCompatActivity {",
      "    @Override",
      "    protected void onCreate(Bundle savedInstanceState) {",
      "        super.onCreate(savedInstanceState);",
      "        TextView view = new TextView(this);",
      `        view.setText("${title}");`,
      "        setContentView(view);",
      "    }",
      "}",
      "```"
    ].join("\n");
  }
  return [
    "```kotlin",
    "import android.os.Bundle",
    "import android.widget.TextView",
    "import androidx.appcompat.app.AppCompatActivity",
    "",
    "class MainActivity : AppCompatActivity() {",
    "    override fun onCreate(savedInstanceState: Bundle?) {",
    "        super.onCreate(savedInstanceState)",
    "        val view = TextView(this)",
    `        view.text = "${title}"`,
    "        setContentView(view)",
    "    }",
    "}",
    "```"
  ].join("\n");
}

export function mockCompletion(req: InferenceRequest): string {
  const head = `[${ROLE_LABELS[req.role]}] Response to: '${req.userPrompt.slice(0, 60)}'`;
  switch (req.role) {
    case "plan":
      return `${head}\n1. Single screen showing the app title\n2. No persistence`;
    case "code":
      return `${head}\n${sampleActivity(req)}`;
    case "review":
      return `${head}\nNO DEFECTS`;
    case "debug":
      return `${head}\nROOT_CAUSE: none\nFIX: none`;
  }
}

export function createMockProvider(delayMs = 0): AIProvider {
  return {
    id: "mock",
    label: "Mock",
    version: async () => ({ ok: true, output: "mock (offline)" }),
    complete: async (req: InferenceRequest, options: CompletionOptions = {}) => {
      if (delayMs > 0) {
        await sleep(delayMs, options.signal);
      }
      const text = mockCompletion(req);
      options.onChunk?.(text);
      return text;
    }
  };
}
