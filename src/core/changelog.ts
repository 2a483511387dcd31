import { readFile } from "node:fs/promises";
import { ParseError } from "../types/errors";

export interface ChangelogEntry {
  readonly tag: string; // "" when the heading carries no version token
  readonly body: string;
}

// "## 1.2.0 (2020-05-23)" opens an entry, indented up to three spaces; "###" does not
const LEVEL2_HEADING = /^ {0,3}##(?:\s|$)/;

/**
 * Splits changelog markdown into entries at level-2 headings.
 *
 * The tag is the first token after the `##` marker, anything else on the
 * heading line is dropped. Text above the first level-2 heading belongs to
 * no entry. Entries come back in document order, duplicates included.
 */
export function parseChangelog(text: string): readonly ChangelogEntry[] {
  const entries: ChangelogEntry[] = [];
  let tag: string | undefined;
  let lines: string[] = [];

  const consumeEntry = () => {
    if (tag === undefined) return;
    entries.push(Object.freeze({ tag, body: trimBlankLines(lines).join("\n") }));
  };

  for (const line of text.split(/\r?\n/)) {
    if (LEVEL2_HEADING.test(line)) {
      consumeEntry();
      tag = line.trimStart().slice(2).trim().split(/\s+/)[0];
      lines = [];
    } else if (tag !== undefined) {
      lines.push(line);
    }
  }
  consumeEntry();

  return Object.freeze(entries);
}

export async function readChangelog(
  file: string,
): Promise<readonly ChangelogEntry[]> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`Cannot read changelog at ${file}: ${reason}`, file, err);
  }
  return parseChangelog(text);
}

export function listTags(entries: readonly ChangelogEntry[]): string[] {
  return entries.map((e) => e.tag);
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === "") start++;
  while (end > start && lines[end - 1].trim() === "") end--;
  return lines.slice(start, end);
}
