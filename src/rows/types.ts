export interface FlattenDefaults {
  sectionColumn: string;
  project: string;
  /** Notes placed on the document's own row. */
  rootNotes: string;
}

export interface RowValidationResult {
  valid: boolean;
  errors: string[];
}
