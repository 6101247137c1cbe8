import { createParseError } from '../../errors.js';

export interface MarkupScanner {
  /** Raw attribute values for every `<tagName ... attrName=...>` in document order. */
  findAttributeValues(html: string, tagName: string, attrName: string): string[];
}

export type ScannerKind = 'pattern' | 'cheerio';

const NAME_PATTERN = /^[a-z][a-z0-9-]*$/i;

/**
 * Best-effort regex scanner. It does not understand comments, scripts,
 * entities or nested quotes; markup it cannot read yields nothing.
 */
export class PatternMarkupScanner implements MarkupScanner {
  findAttributeValues(html: string, tagName: string, attrName: string): string[] {
    assertName(tagName, 'tag');
    assertName(attrName, 'attribute');

    const tagPattern = new RegExp(`<\\s*${tagName}\\b[^>]*>`, 'gi');
    const attrPattern = new RegExp(
      `(?<![\\w-])${attrName}\\s*=\\s*(?:"([^"]*)"|'([^']*)'|([^\\s>]+))`,
      'i',
    );

    const values: string[] = [];
    for (const tagMatch of html.matchAll(tagPattern)) {
      const attrMatch = attrPattern.exec(tagMatch[0]);
      if (!attrMatch) {
        continue;
      }

      const value = (attrMatch[1] ?? attrMatch[2] ?? attrMatch[3] ?? '').trim();
      if (value.length > 0) {
        values.push(value);
      }
    }

    return values;
  }
}

export function assertName(name: string, label: string): void {
  if (!NAME_PATTERN.test(name)) {
    throw createParseError(`Invalid ${label} name: ${name}`, { [label]: name });
  }
}
