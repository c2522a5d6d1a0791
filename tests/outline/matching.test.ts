import { describe, it, expect } from 'vitest';
import { ConfigSchema } from '../../src/config/loader.js';
import {
  classifyParagraph,
  isStyleMatch,
  isTextMatch,
  resolveMatchingRules,
} from '../../src/outline/matching.js';
import { STYLE_ROLES } from '../../src/schema/index.js';
import { defaultRules, para } from '../helpers/paragraphs.js';

describe('isStyleMatch', () => {
  const rules = defaultRules();

  it('matches section styles loosely', () => {
    expect(isStyleMatch('Heading 1', 'section', rules)).toBe(true);
    expect(isStyleMatch('heading 1', 'section', rules)).toBe(true);
    expect(isStyleMatch('Title 1', 'section', rules)).toBe(true);
    expect(isStyleMatch('H1', 'section', rules)).toBe(true);
    expect(isStyleMatch('Custom Section Style', 'section', rules)).toBe(true);
    expect(isStyleMatch('Normal', 'section', rules)).toBe(false);
  });

  it('matches product type styles loosely', () => {
    expect(isStyleMatch('Heading 2', 'productType', rules)).toBe(true);
    expect(isStyleMatch('heading 2', 'productType', rules)).toBe(true);
    expect(isStyleMatch('Title 2', 'productType', rules)).toBe(true);
    expect(isStyleMatch('H2', 'productType', rules)).toBe(true);
    expect(isStyleMatch('Custom Subsection Style', 'productType', rules)).toBe(true);
    expect(isStyleMatch('Normal', 'productType', rules)).toBe(false);
  });

  it('accepts every configured variation as a label, in any case', () => {
    for (const role of STYLE_ROLES) {
      for (const variation of rules.styles[role].variations) {
        expect(isStyleMatch(variation.toUpperCase(), role, rules)).toBe(true);
        expect(isStyleMatch(variation, role, rules)).toBe(true);
      }
    }
  });

  it('matches the nominal label exactly even without variations', () => {
    const custom = resolveMatchingRules(
      ConfigSchema.parse({
        document: {
          headingStyles: { productType: 'Spec Item' },
          headingStyleVariations: { productType: [] },
        },
      })
    );

    expect(isStyleMatch('SPEC ITEM', 'productType', custom)).toBe(true);
    expect(isStyleMatch('Spec Item 2', 'productType', custom)).toBe(false);
    expect(isStyleMatch('Heading 2', 'productType', custom)).toBe(false);
  });

  it('never matches an empty label', () => {
    expect(isStyleMatch('', 'description', rules)).toBe(false);
  });
});

describe('isTextMatch', () => {
  const rules = defaultRules();

  it('recognizes products captions', () => {
    expect(isTextMatch('Products', rules.sectionCaptions)).toBe(true);
    expect(isTextMatch('Product List', rules.sectionCaptions)).toBe(true);
    expect(isTextMatch('Products and Services', rules.sectionCaptions)).toBe(true);
    expect(isTextMatch('Product Information', rules.sectionCaptions)).toBe(true);
    expect(isTextMatch('  PART 2 - PRODUCTS  ', rules.sectionCaptions)).toBe(true);
    expect(isTextMatch('Random Text', rules.sectionCaptions)).toBe(false);
  });

  it('recognizes manufacturer captions', () => {
    expect(isTextMatch('Manufacturer: ABC Corp', rules.manufacturerCaptions)).toBe(true);
    expect(isTextMatch('Manufacturers: XYZ Inc.', rules.manufacturerCaptions)).toBe(true);
    expect(isTextMatch('Mfg: Company A', rules.manufacturerCaptions)).toBe(false);
    expect(isTextMatch('Random Text', rules.manufacturerCaptions)).toBe(false);
  });

  it('uses configured manufacturer synonyms', () => {
    const custom = resolveMatchingRules(
      ConfigSchema.parse({ document: { manufacturerHeadings: ['Manufacturer', 'Mfg', 'Supplier'] } })
    );

    expect(isTextMatch('Mfg: Company A', custom.manufacturerCaptions)).toBe(true);
    expect(isTextMatch('Supplier Information', custom.manufacturerCaptions)).toBe(true);
  });

  it('ignores empty text and empty vocabulary entries', () => {
    expect(isTextMatch('', ['products'])).toBe(false);
    expect(isTextMatch('   ', ['products'])).toBe(false);
    expect(isTextMatch('anything', [''])).toBe(false);
  });
});

describe('classifyParagraph', () => {
  const rules = defaultRules();

  it('returns the role of each heading level', () => {
    expect(classifyParagraph(para('a', 'Heading 1'), rules)).toBe('section');
    expect(classifyParagraph(para('a', 'Heading 2'), rules)).toBe('productType');
    expect(classifyParagraph(para('a', 'Heading 3'), rules)).toBe('manufacturer');
    expect(classifyParagraph(para('a', 'Heading 4'), rules)).toBe('description');
    expect(classifyParagraph(para('a', 'Normal'), rules)).toBeNull();
  });

  it('prefers the outer level when a label fits several roles', () => {
    // "subsection" contains the section variation "section".
    expect(classifyParagraph(para('a', 'Subsection'), rules)).toBe('section');
  });
});
