import type { Document } from 'domhandler';

import { CheerioDocumentParser } from '../../src/services/parser.js';

const parser = new CheerioDocumentParser();

export function parseHtml(html: string): Document {
  return parser.parse(html).root;
}
