export { DocxParagraphSource, assertReadableDocx, paragraphsFromDocument } from './docx-reader.js';
export type { ParagraphSource } from './types.js';
