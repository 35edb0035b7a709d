import type { ProjectLanguage } from "../config";

export type AgentRole = "plan" | "code" | "review" | "debug";

export const ROLE_LABELS: Record<AgentRole, string> = {
  plan: "PLANNER",
  code: "CODER",
  review: "REVIEWER",
  debug: "DEBUGGER"
};

const LANGUAGE_NAMES: Record<ProjectLanguage, string> = {
  kotlin: "Kotlin",
  java: "Java"
};

export function systemPromptFor(role: AgentRole, language: ProjectLanguage): string {
  const lang = LANGUAGE_NAMES[language];
  switch (role) {
    case "plan":
      return [
        `You are a planner for Android applications written in ${lang}.`,
        "Break the request into a short numbered list of screens, data and behaviours.",
        "Do not write code."
      ].join("\n");
    case "code":
      return [
        `You are an Android developer. Generate concise, runnable ${lang} code for a single-activity app.`,
        `The launcher class is MainActivity in ${sourceFileName(language)}; add helper classes only when the plan needs them.`,
        `Put each source file in its own fenced block preceded by a line 'File: <ClassName>${language === "java" ? ".java" : ".kt"}', without other prose.`,
        "Follow the plan and apply every reviewer or debugger note found in memory."
      ].join("\n");
    case "review":
      return [
        `You are reviewing Android ${lang} code for compile errors, crashes and missing features.`,
        "List each problem on its own line prefixed with 'DEFECT:'.",
        "If the code is ready to build, answer 'NO DEFECTS' and nothing else."
      ].join("\n");
    case "debug":
      return [
        "You are a debugging expert for Android applications.",
        "For each reviewer defect give ROOT_CAUSE and FIX lines the coder can apply directly."
      ].join("\n");
  }
}

export function sourceFileName(language: ProjectLanguage): string {
  return language === "java" ? "MainActivity.java" : "MainActivity.kt";
}
