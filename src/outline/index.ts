export { extractOutline, findSectionMarker } from './extractor.js';
export { classifyParagraph, isStyleMatch, isTextMatch, resolveMatchingRules } from './matching.js';
export type { MatchingRules, RoleStyle } from './matching.js';
export { summarizeStructure } from './structure.js';
export type { DiagnosticLevel, ExtractOptions, OutlineDiagnostic, OutlineResult, StructureSummary } from './types.js';
