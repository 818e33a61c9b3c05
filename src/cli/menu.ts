import type { ToolDescriptor } from "../types";
import type { Prompter } from "./prompts";

export type MenuChoice =
  | { kind: "quit" }
  | { kind: "tool"; name: string }
  | { kind: "invalid"; message: string };

const QUIT_WORDS = new Set(["q", "quit", "exit"]);

export function resolveMenuChoice(input: string, toolNames: string[]): MenuChoice {
  const choice = input.trim();
  if (QUIT_WORDS.has(choice.toLowerCase())) {
    return { kind: "quit" };
  }

  const numbered = /^(\d+)\s*\.?$/.exec(choice);
  if (numbered) {
    const name = toolNames[Number(numbered[1]) - 1];
    return name !== undefined ? { kind: "tool", name } : { kind: "invalid", message: "❌ Invalid number." };
  }

  if (toolNames.includes(choice)) {
    return { kind: "tool", name: choice };
  }
  const caseInsensitive = toolNames.find((name) => name.toLowerCase() === choice.toLowerCase());
  if (caseInsensitive) {
    return { kind: "tool", name: caseInsensitive };
  }
  return {
    kind: "invalid",
    message: `❌ Unknown selection '${input}'. Try a number like '1' or a tool name.`,
  };
}

export function formatMenu(tools: ToolDescriptor[]): string[] {
  return [
    "",
    "===== Select a tool (or 'q' to quit) =====",
    ...tools.map(
      (tool, index) => `${index + 1}. ${tool.name}${tool.description ? ` — ${tool.description}` : ""}`,
    ),
  ];
}

/**
 * Shows the menu until the operator picks a tool. Returns null on quit.
 */
export async function selectTool(prompter: Prompter, tools: ToolDescriptor[]): Promise<string | null> {
  const names = tools.map((tool) => tool.name);
  while (true) {
    for (const line of formatMenu(tools)) {
      prompter.print(line);
    }
    const choice = resolveMenuChoice(await prompter.ask("\nChoice: "), names);
    if (choice.kind === "quit") {
      return null;
    }
    if (choice.kind === "tool") {
      return choice.name;
    }
    prompter.print(choice.message);
  }
}
