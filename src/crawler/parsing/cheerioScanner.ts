import { load } from 'cheerio';

import { createParseError } from '../../errors.js';
import { assertName, type MarkupScanner } from './markupScanner.js';

/**
 * Parser-backed scanner for pages the pattern scanner misreads. Entities are
 * decoded and commented-out markup is ignored.
 */
export class CheerioMarkupScanner implements MarkupScanner {
  findAttributeValues(html: string, tagName: string, attrName: string): string[] {
    assertName(tagName, 'tag');
    assertName(attrName, 'attribute');

    try {
      const $ = load(html);
      const values: string[] = [];

      $(`${tagName}[${attrName}]`).each((_idx, element) => {
        const value = $(element).attr(attrName)?.trim();
        if (value) {
          values.push(value);
        }
      });

      return values;
    } catch (error) {
      throw createParseError(
        `Failed to read ${tagName}/${attrName} from HTML`,
        { htmlLength: html.length },
        { cause: error },
      );
    }
  }
}
