import * as cheerio from 'cheerio';

import { config } from '../config/index.js';
import type { DocumentHandle } from '../config/types/analysis.js';

import { ParseError } from '../errors/app-error.js';

import { getErrorMessage } from '../utils/error-details.js';

import { logWarn } from './logger.js';

export interface DocumentParser {
  parse(content: Uint8Array | string): DocumentHandle;
}

function decodeContent(content: Uint8Array | string): string {
  if (typeof content === 'string') return content;
  return new TextDecoder('utf-8').decode(content);
}

function byteLengthOf(content: Uint8Array | string): number {
  return typeof content === 'string'
    ? Buffer.byteLength(content)
    : content.byteLength;
}

function assertWithinSizeLimit(byteLength: number, maxBytes: number): void {
  if (byteLength <= maxBytes) return;
  throw new ParseError(`Document exceeds maximum size of ${maxBytes} bytes`, {
    byteLength,
  });
}

function loadHtml(html: string): cheerio.CheerioAPI {
  try {
    return cheerio.load(html);
  } catch (error) {
    logWarn('Failed to parse HTML', {
      error: getErrorMessage(error),
      htmlLength: html.length,
    });
    throw new ParseError(`Failed to parse HTML: ${getErrorMessage(error)}`);
  }
}

/**
 * cheerio with its parse5 front end. Markup is repaired, never rejected, so
 * failures are limited to oversize input and parser crashes.
 */
export class CheerioDocumentParser implements DocumentParser {
  /** Defaults to the fetch body cap so any page the fetcher accepts parses. */
  constructor(readonly maxBytes = config.fetcher.maxContentLength) {}

  parse(content: Uint8Array | string): DocumentHandle {
    const byteLength = byteLengthOf(content);
    assertWithinSizeLimit(byteLength, this.maxBytes);

    const root = loadHtml(decodeContent(content)).root().get(0);
    if (!root) {
      throw new ParseError('Parser produced no document root');
    }

    return Object.freeze({ root, byteLength });
  }
}
