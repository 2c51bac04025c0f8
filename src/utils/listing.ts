import ansis from "ansis";
import type { TaskListing } from "../types";

const MIN_NAME_WIDTH = 20;

export type TableOptions = {
  color?: boolean;
};

/**
 * Two-column table of task names and descriptions, one row per entry, in the
 * order given.
 */
export function formatTaskTable(
  entries: TaskListing[],
  options: TableOptions = {}
): string {
  const color = options.color ?? true;
  const width = Math.max(
    MIN_NAME_WIDTH,
    ...entries.map((entry) => entry.name.length)
  );

  return entries
    .map((entry) => {
      const name = entry.name.padEnd(width);
      return `${color ? ansis.cyan(name) : name} ${entry.description}`;
    })
    .join("\n");
}

export function printTaskTable(
  entries: TaskListing[],
  options: TableOptions = {}
): void {
  if (entries.length === 0) {
    return;
  }
  console.log(formatTaskTable(entries, options));
}
