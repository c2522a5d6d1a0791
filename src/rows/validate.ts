import { TaskRowSchema, type TaskRow } from '../schema/index.js';
import type { RowValidationResult } from './types.js';

/**
 * Checks the shape of every row and the parent links: row 1 is the only root
 * and every other row points at a task name emitted before it.
 */
export function validateRows(rows: readonly TaskRow[]): RowValidationResult {
  const errors: string[] = [];

  if (rows.length === 0) {
    return { valid: false, errors: ['Row set is empty'] };
  }

  const seen = new Set<string>();
  for (const [index, row] of rows.entries()) {
    const rowNumber = index + 1;
    const parsed = TaskRowSchema.safeParse(row);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        errors.push(`Row ${rowNumber}: ${issue.path.join('.') || 'row'} ${issue.message}`);
      }
      continue;
    }

    if (index === 0) {
      if (row.parentTaskName !== '') {
        errors.push(`Row ${rowNumber}: first row must be the root task`);
      }
    } else if (row.parentTaskName === '') {
      errors.push(`Row ${rowNumber}: only the first row may be a root task`);
    } else if (!seen.has(row.parentTaskName)) {
      errors.push(`Row ${rowNumber}: parent '${row.parentTaskName}' does not precede it`);
    }

    seen.add(row.taskName);
  }

  return { valid: errors.length === 0, errors };
}
