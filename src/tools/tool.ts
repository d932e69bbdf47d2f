import { errorMessage } from "../errors";

/** Stable names of the research tools. */
export type ToolName = "calculator" | "text_analyzer" | "datetime_tool";

export const TOOL_NAMES: readonly ToolName[] = ["calculator", "text_analyzer", "datetime_tool"];

/** A research tool: takes free text, returns free text, never throws. */
export interface ToolSpec {
  name: ToolName;
  description: string;
  run(input: string): Promise<string>;
}

export interface ToolInfo {
  name: ToolName;
  description: string;
}

/**
 * Wrap a synchronous handler so every fault becomes `"<errorPrefix>: <message>"`
 * instead of an exception.
 */
export function defineTool(
  name: ToolName,
  description: string,
  errorPrefix: string,
  handler: (input: string) => string,
): ToolSpec {
  return {
    name,
    description,
    async run(input: string) {
      try {
        return handler(input);
      } catch (e) {
        return `${errorPrefix}: ${errorMessage(e)}`;
      }
    },
  };
}

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((n) => n === name);
}
