/**
 * Runs async operations one at a time, in call order. Sessions use it so that
 * overlapping MCP requests never interleave inside ingest, ask or clear.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  public run<T>(op: () => Promise<T>): Promise<T> {
    const result = this.tail.then(op);
    // The caller gets the rejection through `result`; the chain only waits for settlement.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
