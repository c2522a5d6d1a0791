import type { Config } from '../config/loader.js';
import type { Paragraph, StyleRole } from '../schema/index.js';
import { STYLE_ROLES } from '../schema/index.js';

export interface RoleStyle {
  /** Style name as Word shows it, e.g. "Heading 2". */
  nominal: string;
  /** Lowercase substrings that count as the same style. */
  variations: readonly string[];
}

export interface MatchingRules {
  styles: Readonly<Record<StyleRole, RoleStyle>>;
  sectionCaptions: readonly string[];
  manufacturerCaptions: readonly string[];
}

export function resolveMatchingRules(config: Config): MatchingRules {
  const { headingStyles, headingStyleVariations } = config.document;

  const styles: Record<StyleRole, RoleStyle> = {
    section: { nominal: headingStyles.section, variations: normalizeVocabulary(headingStyleVariations.section) },
    productType: {
      nominal: headingStyles.productType,
      variations: normalizeVocabulary(headingStyleVariations.productType),
    },
    manufacturer: {
      nominal: headingStyles.manufacturer,
      variations: normalizeVocabulary(headingStyleVariations.manufacturer),
    },
    description: {
      nominal: headingStyles.description,
      variations: normalizeVocabulary(headingStyleVariations.description),
    },
  };

  return {
    styles,
    sectionCaptions: normalizeVocabulary([
      config.document.productsHeading,
      ...config.document.productsHeadingVariations,
    ]),
    manufacturerCaptions: normalizeVocabulary(config.document.manufacturerHeadings),
  };
}

export function isStyleMatch(styleLabel: string, role: StyleRole, rules: MatchingRules): boolean {
  if (!styleLabel) return false;

  const label = styleLabel.toLowerCase();
  const style = rules.styles[role];
  if (label === style.nominal.toLowerCase()) return true;

  return style.variations.some((variation) => label.includes(variation));
}

export function isTextMatch(text: string, vocabulary: readonly string[]): boolean {
  const normalized = text.trim().toLowerCase();
  if (!normalized) return false;

  return vocabulary.some((entry) => entry.length > 0 && normalized.includes(entry.toLowerCase()));
}

/**
 * First role whose style matches, checked from the outermost heading level in.
 */
export function classifyParagraph(paragraph: Paragraph, rules: MatchingRules): StyleRole | null {
  for (const role of STYLE_ROLES) {
    if (isStyleMatch(paragraph.styleLabel, role, rules)) {
      return role;
    }
  }
  return null;
}

function normalizeVocabulary(entries: readonly string[]): string[] {
  return entries.map((entry) => entry.trim().toLowerCase()).filter((entry) => entry.length > 0);
}
