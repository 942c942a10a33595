import { describe, expect, it } from "vitest";
import { InvalidArgumentError, isMalformedCall } from "../../errors.js";
import { EVICTION_POLICIES } from "../../summary.js";
import { MAX_SUMMARY_K, MisraGriesSummary } from "../misraGriesSummary.js";

describe.each(EVICTION_POLICIES)("MisraGriesSummary (%s)", (policy) => {
  it("keeps both heavy elements for k=3", () => {
    const s = MisraGriesSummary.fromSequence([1, 1, 1, 2, 2, 2, 3], 3, { policy });
    expect(s.candidates()).toEqual([1, 2]);
    expect(s.estimates()).toEqual([
      { element: 1, count: 2 },
      { element: 2, count: 2 },
    ]);
    expect(s.observed).toBe(7);
  });

  it("reduces to a single majority candidate for k=2", () => {
    const s = MisraGriesSummary.fromSequence([1, 1, 1, 2, 2], 2, { policy });
    expect(s.candidates()).toEqual([1]);
    expect(s.estimate(1)).toBe(1);
    expect(s.estimate(2)).toBe(0);
  });

  it("cancels out a perfectly balanced pair", () => {
    const s = MisraGriesSummary.fromSequence([1, 1, 2, 2, 1, 2], 2, { policy });
    expect(s.candidates()).toEqual([]);
    expect(s.size).toBe(0);
  });

  it("retains nothing when k=1", () => {
    const s = MisraGriesSummary.fromSequence([7, 7, 7, 7, 7], 1, { policy });
    expect(s.candidates()).toEqual([]);
    expect(s.observed).toBe(5);
    expect(s.errorBound()).toBe(5);
  });

  it("never holds more than k-1 candidates while observing", () => {
    const s = new MisraGriesSummary<string>(4, { policy });
    for (const ch of "abcdefgabcabcaaaxyz") {
      s.observe(ch);
      expect(s.size).toBeLessThanOrEqual(3);
      expect(s.candidates().length).toBe(s.size);
    }
  });

  it("matches manual observation", () => {
    const seq = ["x", "y", "x", "z", "x", "w", "y"];
    const manual = new MisraGriesSummary<string>(3, { policy });
    for (const el of seq) manual.observe(el);
    expect(MisraGriesSummary.fromSequence(seq, 3, { policy }).estimates()).toEqual(manual.estimates());
  });

  it("estimates never undercount by more than floor(n/k)", () => {
    const seq = [3, 1, 3, 2, 3, 4, 1, 3, 5, 3, 1, 6];
    const s = MisraGriesSummary.fromSequence(seq, 3, { policy });
    expect(s.errorBound()).toBe(4);
    for (const { element, count } of s.estimates()) {
      const exact = seq.filter((x) => x === element).length;
      expect(count).toBeLessThanOrEqual(exact);
      expect(exact - count).toBeLessThanOrEqual(s.errorBound());
    }
  });

  it("counts by key function", () => {
    const s = MisraGriesSummary.fromSequence(["Go", "go", "GO", "rust"], 2, {
      policy,
      key: (w: string) => w.toLowerCase(),
    });
    expect(s.candidates()).toEqual(["Go"]);
    expect(s.estimate("gO")).toBe(2);
  });

  it.each([0, -1, 2.5, Number.NaN, MAX_SUMMARY_K + 1, 2 ** 40, 2 ** 53])("rejects k=%s", (k) => {
    expect(() => new MisraGriesSummary(k, { policy })).toThrow(InvalidArgumentError);
  });
});

describe("MisraGriesSummary eviction policies", () => {
  it("defaults to group-decrement", () => {
    expect(new MisraGriesSummary(3).policy).toBe("group-decrement");
  });

  it("differ only in which slots get reused", () => {
    // "d" exhausts all three counters; "e" and "f" then land in different slots
    const seq = ["a", "b", "c", "d", "e", "f"];
    const group = MisraGriesSummary.fromSequence(seq, 4, { policy: "group-decrement" });
    const single = MisraGriesSummary.fromSequence(seq, 4, { policy: "single-evict" });

    expect(group.candidates()).toEqual(["f", "e"]);
    expect(single.candidates()).toEqual(["e", "f"]);
    expect(new Set(group.candidates())).toEqual(new Set(single.candidates()));
  });

  it("single-evict revives a parked element that comes back", () => {
    const s = MisraGriesSummary.fromSequence(["a", "b", "c", "d", "b"], 4, { policy: "single-evict" });
    expect(s.candidates()).toEqual(["b"]);
    expect(s.estimate("b")).toBe(1);
    expect(s.estimate("c")).toBe(0);
  });

  it("surfaces construction errors as malformed calls", () => {
    try {
      new MisraGriesSummary(0);
      expect.unreachable();
    } catch (e) {
      expect(isMalformedCall(e)).toBe(true);
    }
  });
});
