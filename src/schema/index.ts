import { z } from 'zod';

export const STYLE_ROLES = ['section', 'productType', 'manufacturer', 'description'] as const;

export const StyleRoleSchema = z.enum(STYLE_ROLES);
export type StyleRole = z.infer<typeof StyleRoleSchema>;

export const ParagraphSchema = z.object({
  text: z.string(),
  styleLabel: z.string(),
});
export type Paragraph = z.infer<typeof ParagraphSchema>;

export const SectionMarkerSchema = z.object({
  position: z.number().int().nonnegative(),
  labelText: z.string(),
});
export type SectionMarker = z.infer<typeof SectionMarkerSchema>;

export const ManufacturerSchema = z.object({
  name: z.string(),
  descriptions: z.array(z.string()),
});
export type Manufacturer = z.infer<typeof ManufacturerSchema>;

export const ProductTypeSchema = z.object({
  name: z.string(),
  manufacturers: z.array(ManufacturerSchema),
});
export type ProductType = z.infer<typeof ProductTypeSchema>;

export const DocumentTreeSchema = z.object({
  documentName: z.string(),
  sectionMarker: SectionMarkerSchema.nullable(),
  productTypes: z.array(ProductTypeSchema),
});
export type DocumentTree = z.infer<typeof DocumentTreeSchema>;

export const TaskRowSchema = z.object({
  taskName: z.string().min(1),
  sectionColumn: z.string(),
  assignee: z.string(),
  dueDate: z.string(),
  priority: z.string(),
  notes: z.string(),
  parentTaskName: z.string(),
  project: z.string(),
});
export type TaskRow = z.infer<typeof TaskRowSchema>;

// Column order of the import file.
export const TASK_COLUMNS = [
  'Task Name',
  'Section/Column',
  'Assignee',
  'Due Date',
  'Priority',
  'Notes',
  'Parent Task',
  'Project',
] as const;

export type TaskColumn = (typeof TASK_COLUMNS)[number];
export type TaskRecord = Record<TaskColumn, string>;
