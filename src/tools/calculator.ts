import { evaluate } from "./expression";
import { defineTool } from "./tool";

/** Format like a plain number, without float noise such as 0.30000000000000004. */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(15)));
}

export const calculatorTool = defineTool(
  "calculator",
  "Useful for performing mathematical calculations. Input should be a mathematical expression like '2+2' or 'sqrt(16)' or '10*5/2'",
  "Error in calculation",
  (input) => {
    const expression = input.trim();
    return `The result of ${expression} is: ${formatNumber(evaluate(expression))}`;
  },
);
