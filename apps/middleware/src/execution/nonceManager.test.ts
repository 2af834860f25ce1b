import { describe, it, expect } from "vitest";
import { Mutex, NonceManager } from "./nonceManager.js";

describe("Mutex", () => {
  it("serializes holders in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const hold = async (name: string, ms: number) => {
      const release = await mutex.acquire();
      events.push(`${name}:start`);
      await new Promise((r) => setTimeout(r, ms));
      events.push(`${name}:end`);
      release();
    };

    await Promise.all([hold("a", 20), hold("b", 0), hold("c", 0)]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });
});

describe("NonceManager", () => {
  it("hands out consecutive nonces to concurrent callers", async () => {
    const nonces = new NonceManager(7, async () => 0);
    const used = await Promise.all(
      Array.from({ length: 5 }, () => nonces.withNonce(async (n) => n))
    );
    expect(used.sort((a, b) => a - b)).toEqual([7, 8, 9, 10, 11]);
    expect(nonces.current()).toBe(12);
  });

  it("does not advance when the callback rejects", async () => {
    const nonces = new NonceManager(3, async () => 0);
    await expect(nonces.withNonce(async () => { throw new Error("rejected by node"); })).rejects.toThrow("rejected by node");
    expect(nonces.current()).toBe(3);
    await expect(nonces.withNonce(async (n) => n)).resolves.toBe(3);
    expect(nonces.current()).toBe(4);
  });

  it("sync replaces the counter with the on-chain value", async () => {
    const nonces = new NonceManager(10, async () => 4);
    await expect(nonces.sync()).resolves.toBe(4);
    expect(nonces.current()).toBe(4);
  });
});
