import { describe, expect, it } from "vitest";
import { calculatorTool, formatNumber } from "../../src/tools/calculator";

describe("calculator tool", () => {
  it("reports the result of an expression", async () => {
    await expect(calculatorTool.run("2+2")).resolves.toBe("The result of 2+2 is: 4");
    await expect(calculatorTool.run(" sqrt(16) ")).resolves.toBe("The result of sqrt(16) is: 4");
  });

  it("hides floating point noise", async () => {
    await expect(calculatorTool.run("0.1 + 0.2")).resolves.toBe("The result of 0.1 + 0.2 is: 0.3");
  });

  it("turns evaluation errors into a message", async () => {
    await expect(calculatorTool.run("1/0")).resolves.toBe("Error in calculation: division by zero");
    await expect(calculatorTool.run("import os")).resolves.toBe("Error in calculation: Unknown identifier 'import'");
    await expect(calculatorTool.run("__import__('os')")).resolves.toBe(
      "Error in calculation: Unexpected character ''' at position 11",
    );
  });
});

describe("formatNumber", () => {
  it("prints integers and trims float noise", () => {
    expect(formatNumber(42)).toBe("42");
    expect(formatNumber(-2.5)).toBe("-2.5");
    expect(formatNumber(1 / 3)).toBe("0.333333333333333");
  });
});
