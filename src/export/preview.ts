import type { TaskRow } from '../schema/index.js';

const NOTES_SEPARATOR = '\n\n';

/**
 * Renders rows as an indented tree, with manufacturer notes listed under
 * their task.
 */
export function formatRowsPreview(rows: readonly TaskRow[]): string {
  const depthByName = new Map<string, number>();
  const lines: string[] = [];

  for (const [index, row] of rows.entries()) {
    const depth = index === 0 ? 0 : (depthByName.get(row.parentTaskName) ?? 0) + 1;
    depthByName.set(row.taskName, depth);

    if (depth === 0) {
      lines.push(row.taskName);
      continue;
    }

    const indent = '   '.repeat(depth - 1);
    lines.push(`${indent}└─ ${row.taskName}`);

    const separatorAt = row.notes.indexOf(NOTES_SEPARATOR);
    if (separatorAt >= 0) {
      for (const note of row.notes.slice(separatorAt + NOTES_SEPARATOR.length).split('\n')) {
        lines.push(`${indent}      ${note}`);
      }
    }
  }

  return lines.join('\n');
}
