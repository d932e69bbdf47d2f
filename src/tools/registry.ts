import { calculatorTool } from "./calculator";
import { createDateTimeTool } from "./datetime";
import { textAnalyzerTool } from "./text-analyzer";
import { isToolName, type ToolInfo, type ToolName, type ToolSpec } from "./tool";
export type { ToolInfo, ToolName, ToolSpec } from "./tool";

/** Closed set of tools keyed by {@link ToolName}, in registration order. */
export class ToolRegistry {
  private readonly tools = new Map<ToolName, ToolSpec>();

  public constructor(tools: readonly ToolSpec[]) {
    for (const tool of tools) this.tools.set(tool.name, tool);
  }

  public get(name: string): ToolSpec | undefined {
    return isToolName(name) ? this.tools.get(name) : undefined;
  }

  public names(): ToolName[] {
    return [...this.tools.keys()];
  }

  public list(): ToolInfo[] {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }
}

/** Registry with the calculator, text analyzer and date/time tools. */
export function createDefaultToolRegistry(now: () => Date = () => new Date()): ToolRegistry {
  return new ToolRegistry([calculatorTool, textAnalyzerTool, createDateTimeTool(now)]);
}
