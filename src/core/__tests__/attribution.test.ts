import { describe, expect, it } from "vitest";
import { blameRecord } from "../../vcs/testing";
import {
  AttributionSet,
  attributionFromBlame,
  compareAttributions,
} from "../attribution";
import { InconsistentAttributionError } from "../errors";

describe("attributionFromBlame", () => {
  it("joins date, time and offset into the timestamp", () => {
    const a = attributionFromBlame(
      blameRecord("aaa", "2012-04-17T14:12:29+0100"),
    );
    expect(a.commitId).toBe("aaa");
    expect(a.timestamp).toBe("2012-04-17T14:12:29+0100");
  });

  it("keeps negative offsets as blamed", () => {
    const a = attributionFromBlame(
      blameRecord("aaa", "2020-12-31T19:00:00-0500"),
    );
    expect(a).toEqual({ commitId: "aaa", timestamp: "2020-12-31T19:00:00-0500" });
  });
});

describe("compareAttributions", () => {
  const at = (id: string, timestamp: string) =>
    attributionFromBlame(blameRecord(id, timestamp));

  it("orders by timestamp first", () => {
    expect(
      compareAttributions(
        at("zzz", "2020-01-01T00:00:00+0000"),
        at("aaa", "2021-01-01T00:00:00+0000"),
      ),
    ).toBeLessThan(0);
  });

  it("compares timestamps in different offsets as text", () => {
    // 10:00+0100 and 09:00+0000 are the same instant.
    expect(
      compareAttributions(
        at("aaa", "2021-03-01T10:00:00+0100"),
        at("bbb", "2021-03-01T09:00:00+0000"),
      ),
    ).toBe(1);
    expect(
      compareAttributions(
        at("aaa", "2021-03-01T09:00:00+0100"),
        at("bbb", "2021-03-01T09:00:00+0000"),
      ),
    ).toBe(1);
  });

  it("falls back to the commit id", () => {
    expect(
      compareAttributions(
        at("b", "2020-01-01T00:00:00+0000"),
        at("a", "2020-01-01T00:00:00+0000"),
      ),
    ).toBe(1);
    expect(
      compareAttributions(
        at("a", "2020-01-01T00:00:00+0000"),
        at("a", "2020-01-01T00:00:00+0000"),
      ),
    ).toBe(0);
  });
});

describe("AttributionSet", () => {
  it("deduplicates by commit", () => {
    const set = new AttributionSet();
    set.add(attributionFromBlame(blameRecord("aaa", "2021-01-01T10:00:00+0000")));
    set.add(attributionFromBlame(blameRecord("aaa", "2021-01-01T10:00:00+0000")));
    expect(set.size).toBe(1);
    expect(set.has("aaa")).toBe(true);
    expect(set.toPlan()).toEqual(["aaa"]);
  });

  it("rejects a second timestamp for the same commit", () => {
    const set = new AttributionSet();
    set.add(attributionFromBlame(blameRecord("aaa", "2021-01-01T10:00:00+0000")));
    expect(() =>
      set.add(
        attributionFromBlame(blameRecord("aaa", "2021-01-01T11:00:00+0100")),
      ),
    ).toThrow(InconsistentAttributionError);
  });

  it("is empty until something is added", () => {
    const set = new AttributionSet();
    expect(set.size).toBe(0);
    expect(set.toPlan()).toEqual([]);
  });
});
