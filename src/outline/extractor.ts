import type { DocumentTree, Manufacturer, Paragraph, ProductType, SectionMarker } from '../schema/index.js';
import { classifyParagraph, isStyleMatch, isTextMatch, type MatchingRules } from './matching.js';
import type { ExtractOptions, OutlineDiagnostic, OutlineResult } from './types.js';

// The first products heading is usually the table of contents entry.
const MARKER_OCCURRENCE = 2;

interface OutlineCursor {
  productTypes: ProductType[];
  currentProductType: ProductType | null;
  currentManufacturer: Manufacturer | null;
  diagnostics: OutlineDiagnostic[];
}

export function findSectionMarker(paragraphs: readonly Paragraph[], rules: MatchingRules): SectionMarker | null {
  let occurrences = 0;

  for (const [position, paragraph] of paragraphs.entries()) {
    if (!isStyleMatch(paragraph.styleLabel, 'section', rules)) continue;
    if (!isTextMatch(paragraph.text, rules.sectionCaptions)) continue;

    occurrences++;
    if (occurrences === MARKER_OCCURRENCE) {
      return { position, labelText: paragraph.text.trim() };
    }
  }

  return null;
}

export function extractOutline(paragraphs: readonly Paragraph[], options: ExtractOptions): OutlineResult {
  const { documentName, rules } = options;
  const diagnostics: OutlineDiagnostic[] = [];

  const sectionMarker = findSectionMarker(paragraphs, rules);
  if (!sectionMarker) {
    diagnostics.push({ level: 'warning', message: 'Products section not found' });
    return { tree: { documentName, sectionMarker: null, productTypes: [] }, diagnostics };
  }

  diagnostics.push({
    level: 'info',
    message: `Products section: '${sectionMarker.labelText}'`,
    paragraph: sectionMarker.position,
  });

  const cursor: OutlineCursor = {
    productTypes: [],
    currentProductType: null,
    currentManufacturer: null,
    diagnostics,
  };

  for (let index = sectionMarker.position + 1; index < paragraphs.length; index++) {
    const paragraph = paragraphs[index];
    if (!paragraph) break;

    if (!consumeParagraph(cursor, paragraph, index, rules)) {
      break;
    }
  }

  const tree: DocumentTree = { documentName, sectionMarker, productTypes: cursor.productTypes };
  return { tree, diagnostics };
}

/**
 * Applies one paragraph to the cursor. Returns false when the paragraph closes
 * the products region.
 */
function consumeParagraph(cursor: OutlineCursor, paragraph: Paragraph, index: number, rules: MatchingRules): boolean {
  const role = classifyParagraph(paragraph, rules);
  const text = paragraph.text.trim();

  switch (role) {
    case 'section':
      cursor.diagnostics.push({ level: 'debug', message: `Products section ends at '${text}'`, paragraph: index });
      return false;

    case 'productType': {
      const productType: ProductType = { name: text, manufacturers: [] };
      cursor.productTypes.push(productType);
      cursor.currentProductType = productType;
      cursor.currentManufacturer = null;
      cursor.diagnostics.push({ level: 'debug', message: `Product type '${text}'`, paragraph: index });
      return true;
    }

    case 'manufacturer': {
      if (!cursor.currentProductType) {
        cursor.diagnostics.push({
          level: 'warning',
          message: `Manufacturer heading '${text}' has no product type above it; dropped`,
          paragraph: index,
        });
        return true;
      }
      if (!isTextMatch(text, rules.manufacturerCaptions)) {
        cursor.diagnostics.push({
          level: 'debug',
          message: `Heading '${text}' does not name a manufacturer; ignored`,
          paragraph: index,
        });
        return true;
      }
      const manufacturer: Manufacturer = { name: text, descriptions: [] };
      cursor.currentProductType.manufacturers.push(manufacturer);
      cursor.currentManufacturer = manufacturer;
      cursor.diagnostics.push({ level: 'debug', message: `Manufacturer '${text}'`, paragraph: index });
      return true;
    }

    case 'description':
      if (!cursor.currentManufacturer) {
        cursor.diagnostics.push({
          level: 'warning',
          message: `Description '${text}' has no manufacturer above it; dropped`,
          paragraph: index,
        });
        return true;
      }
      cursor.currentManufacturer.descriptions.push(text);
      return true;

    case null:
      return true;
  }
}
