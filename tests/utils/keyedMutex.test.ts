import { describe, expect, it } from "vitest";
import { KeyedMutex } from "@/lib/utils/keyedMutex";

function gate() {
  let open: () => void = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe("KeyedMutex", () => {
  it("runs tasks for the same key one after another", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const first = gate();

    const a = mutex.runExclusive("r1", async () => {
      order.push("a:start");
      await first.opened;
      order.push("a:end");
    });
    const b = mutex.runExclusive("r1", async () => {
      order.push("b");
    });

    await Promise.resolve();
    expect(mutex.isLocked("r1")).toBe(true);
    first.open();
    await Promise.all([a, b]);

    expect(order).toEqual(["a:start", "a:end", "b"]);
    expect(mutex.isLocked("r1")).toBe(false);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const held = gate();
    const a = mutex.runExclusive("r1", () => held.opened);

    await expect(mutex.runExclusive("r2", async () => "done")).resolves.toBe("done");

    held.open();
    await a;
  });

  it("releases the key when a task throws", async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive("r1", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive("r1", async () => 1)).resolves.toBe(1);
    expect(mutex.isLocked("r1")).toBe(false);
  });
});
