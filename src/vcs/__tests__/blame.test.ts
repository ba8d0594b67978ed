import { describe, expect, it } from "vitest";
import { MalformedBlameOutputError } from "../../core/errors";
import {
  offsetMinutes,
  parseBlamePorcelain,
  validateBlameRecord,
} from "../blame";

const SHA = "f9aa76a852485f9aa76a852485f9aa76a8524851";

function porcelain(headers: string[], sha = SHA): string {
  return [`${sha} 132 132 1`, ...headers, "\t.name = DRIVER_NAME,"].join("\n");
}

const FULL_HEADERS = [
  "author Ada Lovelace",
  "author-mail <ada@example.com>",
  "author-time 1334668349",
  "author-tz +0100",
  "committer Charles Babbage",
  "committer-mail <charles@example.com>",
  "committer-time 1334700000",
  "committer-tz +0000",
  "summary drm: add suspend quirk",
  "filename drivers/x.c",
];

describe("parseBlamePorcelain", () => {
  it("renders the author date in the author's offset", () => {
    expect(parseBlamePorcelain(porcelain(FULL_HEADERS), "drivers/x.c", 132))
      .toEqual({
        commitId: SHA,
        authorName: "Ada Lovelace",
        date: "2012-04-17",
        time: "14:12:29",
        utcOffset: "+0100",
      });
  });

  it("rolls the date back for negative offsets", () => {
    const headers = [
      "author Grace Hopper",
      "author-time 1609459200",
      "author-tz -0500",
      "filename a.txt",
    ];
    const record = parseBlamePorcelain(porcelain(headers), "a.txt", 1);
    expect(record.date).toBe("2020-12-31");
    expect(record.time).toBe("19:00:00");
    expect(record.utcOffset).toBe("-0500");
  });

  it("accepts a header line without a group count", () => {
    const output = [`${SHA} 7 9`, ...FULL_HEADERS, "\tx"].join("\n");
    expect(parseBlamePorcelain(output, "drivers/x.c", 9).commitId).toBe(SHA);
  });

  it("does not read header-like text from the line content", () => {
    const output = [
      `${SHA} 1 1 1`,
      "author-time 1334668349",
      "author-tz +0100",
      "\tauthor Someone Else",
    ].join("\n");
    expect(() => parseBlamePorcelain(output, "a.txt", 1)).toThrow(
      MalformedBlameOutputError,
    );
  });

  it("rejects output without a commit header", () => {
    expect(() =>
      parseBlamePorcelain(
        "f9aa76a8 (Ada Lovelace 2012-04-17 14:12:29 +0100 132) x",
        "drivers/x.c",
        132,
      ),
    ).toThrow(MalformedBlameOutputError);
  });

  it("rejects output missing the author date", () => {
    const headers = FULL_HEADERS.filter((h) => !h.startsWith("author-tz"));
    expect(() =>
      parseBlamePorcelain(porcelain(headers), "drivers/x.c", 132),
    ).toThrow("Malformed blame output for drivers/x.c:132");
  });

  it("rejects a non-numeric author time", () => {
    const headers = FULL_HEADERS.map((h) =>
      h.startsWith("author-time") ? "author-time yesterday" : h,
    );
    expect(() =>
      parseBlamePorcelain(porcelain(headers), "drivers/x.c", 132),
    ).toThrow(MalformedBlameOutputError);
  });
});

describe("validateBlameRecord", () => {
  const valid = {
    commitId: "aaa",
    authorName: "Test Author",
    date: "2021-01-01",
    time: "10:00:00",
    utcOffset: "+0000",
  };

  it("passes a well-formed record through", () => {
    expect(validateBlameRecord(valid, "a.txt", 1)).toEqual(valid);
  });

  it.each([
    ["date", { ...valid, date: "01/01/2021" }],
    ["time", { ...valid, time: "25:00:00" }],
    ["utcOffset", { ...valid, utcOffset: "UTC" }],
    ["commitId", { ...valid, commitId: "" }],
  ])("rejects a bad %s", (field, record) => {
    expect(() => validateBlameRecord(record, "a.txt", 3)).toThrow(
      `Malformed blame output for a.txt:3: ${field}:`,
    );
  });

  it("rejects a record missing fields", () => {
    const { authorName: _omitted, ...partial } = valid;
    expect(() => validateBlameRecord(partial, "a.txt", 1)).toThrow(
      MalformedBlameOutputError,
    );
  });
});

describe("offsetMinutes", () => {
  it("converts signed offsets", () => {
    expect(offsetMinutes("+0000")).toBe(0);
    expect(offsetMinutes("+0530")).toBe(330);
    expect(offsetMinutes("-0800")).toBe(-480);
  });

  it("returns NaN for anything else", () => {
    expect(offsetMinutes("Z")).toBeNaN();
  });
});
