import { describe, it, expect } from "vitest";
import { CommandQueue } from "./command-queue.js";

describe("CommandQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new CommandQueue();
    const log: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run(async () => {
      log.push("first:start");
      await gate;
      log.push("first:end");
    });
    const second = queue.run(() => {
      log.push("second");
    });

    expect(queue.size).toBe(2);
    await Promise.resolve();
    release();
    await Promise.all([first, second]);

    expect(log).toEqual(["first:start", "first:end", "second"]);
    expect(queue.size).toBe(0);
  });

  it("keeps going after a task rejects", async () => {
    const queue = new CommandQueue();
    const failed = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(() => 42);

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });

  it("drain waits for everything already queued", async () => {
    const queue = new CommandQueue();
    const done: number[] = [];
    void queue.run(async () => {
      await Promise.resolve();
      done.push(1);
    });
    void queue.run(() => {
      done.push(2);
    });

    await queue.drain();
    expect(done).toEqual([1, 2]);
  });
});
