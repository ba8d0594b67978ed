import { z } from "zod";
import { MalformedBlameOutputError } from "../core/errors";
import type { BlameRecord } from "./types";

export const BlameRecordSchema = z.object({
  commitId: z
    .string()
    .regex(/^\S+$/, "commit id must be a single non-empty token"),
  authorName: z.string(),
  date: z
    .string()
    .regex(
      /^\d{4}-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])$/,
      "date must be YYYY-MM-DD",
    ),
  time: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d:[0-5]\d$/, "time must be HH:MM:SS"),
  utcOffset: z
    .string()
    .regex(/^[+-]([01]\d|2[0-3])[0-5]\d$/, "offset must be +HHMM or -HHMM"),
});

/**
 * Validate a record handed back by a blame oracle. Anything that does not
 * carry all five fields in the expected shape is rejected.
 */
export function validateBlameRecord(
  value: unknown,
  path: string,
  line: number,
): BlameRecord {
  const result = BlameRecordSchema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "record"}: ${issue.message}`)
      .join("; ");
    throw new MalformedBlameOutputError(path, line, detail);
  }
  return result.data;
}

/** Offset string (+HHMM / -HHMM) to signed minutes east of UTC. */
export function offsetMinutes(utcOffset: string): number {
  const m = /^([+-])(\d{2})(\d{2})$/.exec(utcOffset);
  if (!m || !m[2] || !m[3]) return Number.NaN;
  const minutes = Number.parseInt(m[2], 10) * 60 + Number.parseInt(m[3], 10);
  return m[1] === "-" ? -minutes : minutes;
}

const COMMIT_LINE = /^([0-9a-f]{4,64}) \d+ \d+(?: \d+)?$/;

/**
 * Parse `git blame --porcelain` output for a single line.
 *
 * The date comes from `author-time` rendered in the author's own offset
 * (`author-tz`), which is what plain `git blame` prints.
 */
export function parseBlamePorcelain(
  output: string,
  path: string,
  line: number,
): BlameRecord {
  const lines = output.split("\n");
  const header = lines[0]?.trim() ?? "";
  const commitMatch = COMMIT_LINE.exec(header);
  if (!commitMatch || !commitMatch[1]) {
    throw new MalformedBlameOutputError(
      path,
      line,
      `unexpected header line "${header}"`,
    );
  }

  const fields = new Map<string, string>();
  for (const raw of lines.slice(1)) {
    // Content line; headers end here.
    if (raw.startsWith("\t")) break;
    const space = raw.indexOf(" ");
    if (space === -1) continue;
    fields.set(raw.slice(0, space), raw.slice(space + 1));
  }

  const authorName = fields.get("author");
  const authorTime = fields.get("author-time");
  const authorTz = fields.get("author-tz");
  if (authorName === undefined || !authorTime || !authorTz) {
    throw new MalformedBlameOutputError(
      path,
      line,
      "missing author, author-time or author-tz header",
    );
  }

  const epochSeconds = Number.parseInt(authorTime, 10);
  const offset = offsetMinutes(authorTz);
  if (!/^\d+$/.test(authorTime) || Number.isNaN(offset)) {
    throw new MalformedBlameOutputError(
      path,
      line,
      `cannot read author date "${authorTime} ${authorTz}"`,
    );
  }

  const local = new Date((epochSeconds + offset * 60) * 1000).toISOString();
  return validateBlameRecord(
    {
      commitId: commitMatch[1],
      authorName,
      date: local.slice(0, 10),
      time: local.slice(11, 19),
      utcOffset: authorTz,
    },
    path,
    line,
  );
}
