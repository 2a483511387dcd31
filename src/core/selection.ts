import type { ChangelogEntry } from "./changelog";
import { ConfigError, NotFoundError } from "../types/errors";

export type Selection =
  | { mode: "latest" }
  | { mode: "named"; tag: string }
  | { mode: "all" };

export interface SelectionArgs {
  tag?: string;
  all?: boolean;
}

export function resolveSelection(args: SelectionArgs): Selection {
  if (args.tag !== undefined && args.all) {
    throw new ConfigError("Do not provide a tag together with --all");
  }
  if (args.all) return { mode: "all" };
  if (args.tag !== undefined) return { mode: "named", tag: args.tag };
  return { mode: "latest" };
}

/**
 * Picks the entries a run will sync. The latest entry is the first one in
 * the document; `all` leaves out entries whose heading had no tag.
 */
export function selectEntries(
  entries: readonly ChangelogEntry[],
  selection: Selection,
): ChangelogEntry[] {
  switch (selection.mode) {
    case "latest":
      if (!entries.length) throw new NotFoundError("No changelog entries");
      return [entries[0]];
    case "named": {
      const match = entries.find((e) => e.tag === selection.tag);
      if (!selection.tag || !match) {
        throw new NotFoundError(`No such tag '${selection.tag}' in changelog`);
      }
      return [match];
    }
    case "all":
      return entries.filter((e) => e.tag !== "");
  }
}
