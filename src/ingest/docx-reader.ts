import fs from 'node:fs';
import path from 'node:path';
import mammoth from 'mammoth';
import { IngestionError, errorMessage } from '../errors.js';
import type { Paragraph } from '../schema/index.js';
import type { ParagraphSource } from './types.js';

// Word applies "Normal" to paragraphs without an explicit style.
const DEFAULT_STYLE = 'Normal';
const DOCX_EXTENSIONS = ['.docx'];

type ElementNode = Record<string, unknown>;

export class DocxParagraphSource implements ParagraphSource {
  async read(filePath: string): Promise<Paragraph[]> {
    assertReadableDocx(filePath);

    const captured: { paragraphs?: Paragraph[] } = {};
    try {
      await mammoth.convertToHtml(
        { path: filePath },
        {
          transformDocument: (document: unknown): unknown => {
            captured.paragraphs = paragraphsFromDocument(document);
            return document;
          },
        }
      );
    } catch (error) {
      throw new IngestionError(filePath, `could not read document (${errorMessage(error)})`);
    }

    if (!captured.paragraphs) {
      throw new IngestionError(filePath, 'document body is missing');
    }
    return captured.paragraphs;
  }
}

export function assertReadableDocx(filePath: string): void {
  if (!filePath) {
    throw new IngestionError(filePath, 'file path is empty');
  }
  if (!fs.existsSync(filePath)) {
    throw new IngestionError(filePath, 'file does not exist');
  }
  if (!fs.statSync(filePath).isFile()) {
    throw new IngestionError(filePath, 'path is not a file');
  }
  const extension = path.extname(filePath).toLowerCase();
  if (!DOCX_EXTENSIONS.includes(extension)) {
    throw new IngestionError(filePath, `unsupported extension '${extension}', expected .docx`);
  }
}

/**
 * Body-level paragraphs of a parsed document in reading order. Paragraphs
 * nested in tables are not part of the outline and are skipped.
 */
export function paragraphsFromDocument(document: unknown): Paragraph[] {
  if (!isElement(document)) return [];

  const paragraphs: Paragraph[] = [];
  for (const child of childrenOf(document)) {
    if (child.type !== 'paragraph') continue;

    const styleName = typeof child.styleName === 'string' && child.styleName ? child.styleName : DEFAULT_STYLE;
    paragraphs.push({ text: collectText(child), styleLabel: styleName });
  }
  return paragraphs;
}

function collectText(element: ElementNode): string {
  switch (element.type) {
    case 'text':
      return typeof element.value === 'string' ? element.value : '';
    case 'tab':
      return '\t';
    case 'break':
      return '\n';
    default:
      return childrenOf(element).map(collectText).join('');
  }
}

function childrenOf(element: ElementNode): ElementNode[] {
  const { children } = element;
  if (!Array.isArray(children)) return [];
  return children.filter(isElement);
}

function isElement(value: unknown): value is ElementNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
