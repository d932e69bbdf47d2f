import { describe, expect, it } from "vitest";
import { SerialQueue } from "../src/serial";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("SerialQueue", () => {
  it("runs operations one at a time in call order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];
    const op = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await sleep(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([queue.run(op("slow", 10)), queue.run(op("fast", 0))]);

    expect(results).toEqual(["slow", "fast"]);
    expect(events).toEqual(["slow:start", "slow:end", "fast:start", "fast:end"]);
  });

  it("hands a rejection to its caller and keeps going", async () => {
    const queue = new SerialQueue();
    const failed = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(async () => "after");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });
});
