import { describe, expect, it } from "vitest";
import { Mutex } from "../src/index.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 5));

describe("Mutex", () => {
  it("runs exclusive tasks one at a time, in request order", async () => {
    const mutex = new Mutex();
    const trace: string[] = [];
    const task = (name: string) =>
      mutex.runExclusive(async () => {
        trace.push(`${name}:start`);
        await tick();
        trace.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task("a"), task("b"), task("c")]);
    expect(results).toEqual(["a", "b", "c"]);
    expect(trace).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.isLocked()).toBe(false);
  });

  it("releases the lock when a task throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(() => 7)).resolves.toBe(7);
  });
});
