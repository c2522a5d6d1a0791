import type { Paragraph, StyleRole } from '../schema/index.js';
import { classifyParagraph, type MatchingRules } from './matching.js';
import type { StructureSummary } from './types.js';

export function summarizeStructure(paragraphs: readonly Paragraph[], rules: MatchingRules): StructureSummary {
  const headingCounts: Record<StyleRole, number> = {
    section: 0,
    productType: 0,
    manufacturer: 0,
    description: 0,
  };

  for (const paragraph of paragraphs) {
    const role = classifyParagraph(paragraph, rules);
    if (role) {
      headingCounts[role]++;
    }
  }

  return { paragraphCount: paragraphs.length, headingCounts };
}
