import { CheerioMarkupScanner } from './cheerioScanner.js';
import { PatternMarkupScanner, type MarkupScanner, type ScannerKind } from './markupScanner.js';

export function createMarkupScanner(kind: ScannerKind = 'pattern'): MarkupScanner {
  return kind === 'cheerio' ? new CheerioMarkupScanner() : new PatternMarkupScanner();
}

export { CheerioMarkupScanner, PatternMarkupScanner };
export type { MarkupScanner, ScannerKind };
