import { ConfigSchema, type Config } from '../../src/config/loader.js';
import type { ParagraphSource } from '../../src/ingest/types.js';
import { IngestionError } from '../../src/errors.js';
import { resolveMatchingRules, type MatchingRules } from '../../src/outline/matching.js';
import type { Paragraph } from '../../src/schema/index.js';

export function para(text: string, styleLabel: string = 'Normal'): Paragraph {
  return { text, styleLabel };
}

export function h1(text: string): Paragraph {
  return para(text, 'Heading 1');
}

export function h2(text: string): Paragraph {
  return para(text, 'Heading 2');
}

export function h3(text: string): Paragraph {
  return para(text, 'Heading 3');
}

export function h4(text: string): Paragraph {
  return para(text, 'Heading 4');
}

export function defaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function defaultRules(): MatchingRules {
  return resolveMatchingRules(defaultConfig());
}

/**
 * In-memory documents keyed by file name (without directory).
 */
export class MemoryParagraphSource implements ParagraphSource {
  readonly reads: string[] = [];

  constructor(private readonly documents: Record<string, Paragraph[]>) {}

  async read(filePath: string): Promise<Paragraph[]> {
    this.reads.push(filePath);
    const name = filePath.split(/[\\/]/).pop() ?? filePath;
    const paragraphs = this.documents[name];
    if (!paragraphs) {
      throw new IngestionError(filePath, 'file does not exist');
    }
    return paragraphs;
  }
}
