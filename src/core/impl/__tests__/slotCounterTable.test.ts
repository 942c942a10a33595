import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../../errors.js";
import { MAX_SLOTS, SlotCounterTable } from "../slotCounterTable.js";

describe("SlotCounterTable", () => {
  it("hands out slots from 0 and indexes by key", () => {
    const t = new SlotCounterTable<string>(3);
    expect(t.claim("a")).toBe(0);
    expect(t.claim("b")).toBe(1);
    expect(t.slotOf("b")).toBe(1);
    expect(t.slotOf("z")).toBe(-1);
    expect(t.elementAt(0)).toBe("a");
    expect(t.liveSize()).toBe(2);
  });

  it("refuses to claim when every slot is live", () => {
    const t = new SlotCounterTable<string>(1);
    t.claim("a");
    expect(t.claim("b")).toBe(-1);
    expect(t.entries()).toEqual([["a", 1]]);
  });

  it("bumps instead of claiming an element it already tracks", () => {
    const t = new SlotCounterTable<string>(2);
    t.claim("a");
    expect(t.claim("a")).toBe(0);
    expect(t.countAt(0)).toBe(2);
    expect(t.liveSize()).toBe(1);
  });

  it("reports exhausted slots in slot order", () => {
    const t = new SlotCounterTable<string>(3);
    t.claim("a");
    t.claim("b");
    t.bump(1);
    t.claim("c");

    expect(t.decrementAll()).toEqual([0, 2]);
    expect(t.liveSize()).toBe(1);
    expect(t.entries()).toEqual([["b", 1]]);
  });

  it("skips parked slots and reclaims them after free ones", () => {
    const t = new SlotCounterTable<string>(2);
    t.claim("a");
    t.claim("b");
    expect(t.decrementAll()).toEqual([0, 1]);
    t.release(0);
    t.park(1);

    expect(t.liveSize()).toBe(0);
    expect(t.entries()).toEqual([]);
    expect(t.slotOf("b")).toBe(1);

    expect(t.claim("c")).toBe(0);
    expect(t.claim("d")).toBe(1);
    expect(t.slotOf("b")).toBe(-1);
    expect(t.entries()).toEqual([
      ["c", 1],
      ["d", 1],
    ]);
  });

  it("revives a parked slot on bump", () => {
    const t = new SlotCounterTable<string>(1);
    t.claim("a");
    t.park(0);
    expect(t.liveSize()).toBe(0);
    t.bump(0);
    expect(t.liveSize()).toBe(1);
    expect(t.entries()).toEqual([["a", 1]]);
  });

  it("counts by key and keeps the first element seen", () => {
    const t = new SlotCounterTable<{ id: number; label: string }>(2, (e) => e.id);
    t.claim({ id: 1, label: "first" });
    t.claim({ id: 1, label: "again" });
    expect(t.entries()).toEqual([[{ id: 1, label: "first" }, 2]]);
  });

  it("holds nothing at capacity 0", () => {
    const t = new SlotCounterTable<string>(0);
    expect(t.claim("a")).toBe(-1);
    expect(t.decrementAll()).toEqual([]);
    expect(t.liveSize()).toBe(0);
  });

  it("rejects negative or fractional capacity", () => {
    expect(() => new SlotCounterTable(-1)).toThrow(InvalidArgumentError);
    expect(() => new SlotCounterTable(1.5)).toThrow(InvalidArgumentError);
  });

  it("keeps counts exact past 2^32", () => {
    const t = new SlotCounterTable<string>(1);
    t.claim("a");
    t.bump(0, 2 ** 32 - 1);
    expect(t.countAt(0)).toBe(2 ** 32);
    t.bump(0);
    expect(t.liveSize()).toBe(1);
    expect(t.entries()).toEqual([["a", 2 ** 32 + 1]]);
    expect(t.decrementAll()).toEqual([]);
    expect(t.countAt(0)).toBe(2 ** 32);
  });

  it("rejects non-positive or fractional increments", () => {
    const t = new SlotCounterTable<string>(1);
    t.claim("a");
    expect(() => t.bump(0, 0)).toThrow(InvalidArgumentError);
    expect(() => t.bump(0, 1.5)).toThrow(InvalidArgumentError);
    expect(t.countAt(0)).toBe(1);
  });

  it("rejects capacity above MAX_SLOTS before allocating", () => {
    expect(() => new SlotCounterTable(MAX_SLOTS + 1)).toThrow(InvalidArgumentError);
    expect(() => new SlotCounterTable(2 ** 53)).toThrow(InvalidArgumentError);
  });

  it("throws when bumping a free slot", () => {
    const t = new SlotCounterTable<string>(2);
    expect(() => t.bump(1)).toThrow(InvalidArgumentError);
  });

  it("clear() empties every slot", () => {
    const t = new SlotCounterTable<string>(2);
    t.claim("a");
    t.claim("b");
    t.clear();
    expect(t.liveSize()).toBe(0);
    expect(t.slotOf("a")).toBe(-1);
    expect(t.claim("c")).toBe(0);
  });
});
