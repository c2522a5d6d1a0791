import type { DocumentTree, StyleRole } from '../schema/index.js';
import type { MatchingRules } from './matching.js';

export type DiagnosticLevel = 'debug' | 'info' | 'warning';

export interface OutlineDiagnostic {
  level: DiagnosticLevel;
  message: string;
  /** Index of the paragraph the note is about, when there is one. */
  paragraph?: number;
}

export interface ExtractOptions {
  documentName: string;
  rules: MatchingRules;
}

export interface OutlineResult {
  tree: DocumentTree;
  diagnostics: OutlineDiagnostic[];
}

export interface StructureSummary {
  paragraphCount: number;
  headingCounts: Record<StyleRole, number>;
}
