import { IdentityError } from '../errors.js';
import type { DocumentTree, Manufacturer, TaskRecord, TaskRow } from '../schema/index.js';
import { sanitizeField } from './sanitize.js';
import type { FlattenDefaults } from './types.js';

export function flattenTree(tree: DocumentTree, defaults: FlattenDefaults): TaskRow[] {
  const rootName = sanitizeField(tree.documentName);
  if (!rootName) {
    throw new IdentityError();
  }

  const makeRow = (taskName: string, parentTaskName: string, notes: string): TaskRow => ({
    taskName,
    sectionColumn: defaults.sectionColumn,
    assignee: '',
    dueDate: '',
    priority: '',
    notes,
    parentTaskName,
    project: defaults.project,
  });

  const rows: TaskRow[] = [makeRow(rootName, '', defaults.rootNotes)];

  for (const productType of tree.productTypes) {
    const productName = sanitizeField(productType.name);
    if (!productName) continue;

    rows.push(makeRow(productName, rootName, ''));

    for (const manufacturer of productType.manufacturers) {
      const manufacturerName = sanitizeField(manufacturer.name);
      if (!manufacturerName) continue;

      rows.push(makeRow(manufacturerName, productName, composeNotes(manufacturerName, manufacturer)));
    }
  }

  return rows;
}

/**
 * Manufacturer name, a blank line, then one description per line. Lines are
 * sanitized one by one so the separators survive.
 */
export function composeNotes(manufacturerName: string, manufacturer: Manufacturer): string {
  if (manufacturer.descriptions.length === 0) {
    return manufacturerName;
  }
  const body = manufacturer.descriptions.map((line) => sanitizeField(line)).join('\n');
  return `${manufacturerName}\n\n${body}`;
}

export function toRecord(row: TaskRow): TaskRecord {
  return {
    'Task Name': row.taskName,
    'Section/Column': row.sectionColumn,
    Assignee: row.assignee,
    'Due Date': row.dueDate,
    Priority: row.priority,
    Notes: row.notes,
    'Parent Task': row.parentTaskName,
    Project: row.project,
  };
}
