import type { Paragraph } from '../schema/index.js';

/**
 * Anything that can turn a file into styled paragraphs in reading order.
 * Implementations throw IngestionError when the file cannot be read.
 */
export interface ParagraphSource {
  read(filePath: string): Promise<Paragraph[]>;
}
