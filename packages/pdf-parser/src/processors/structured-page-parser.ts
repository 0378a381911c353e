import type {
  StructuredElement,
  StructuredPage,
  TableRows,
} from '@pdfloom/model';

import { STRUCTURE } from '../config/constants';

const COLUMN_GAP = /\s{2,}/;

/**
 * Derives a light document structure from layout-preserving page text.
 *
 * - Paragraphs are blocks separated by blank lines.
 * - A short block ending in sentence punctuation is treated as a heading.
 * - A table is a run of consecutive lines that split into the same number
 *   of columns on gaps of two or more spaces.
 */
export class StructuredPageParser {
  static parse(page: number, text: string): StructuredPage {
    return {
      page,
      elements: StructuredPageParser.parseElements(text),
      tables: StructuredPageParser.parseTables(text),
      rawText: text,
    };
  }

  static parseElements(text: string): StructuredElement[] {
    return text
      .split('\n\n')
      .map((block) => block.trim())
      .filter((block) => block.length > 0)
      .map((block): StructuredElement => ({
        type: StructuredPageParser.isHeading(block) ? 'heading' : 'paragraph',
        content: block,
      }));
  }

  static isHeading(block: string): boolean {
    const words = block.split(/\s+/);
    return (
      words.length <= STRUCTURE.HEADING_MAX_WORDS &&
      block.length <= STRUCTURE.HEADING_MAX_CHARS &&
      STRUCTURE.HEADING_ENDINGS.some((ending) => block.endsWith(ending))
    );
  }

  static parseTables(text: string): TableRows[] {
    const tables: TableRows[] = [];
    let run: TableRows = [];

    const flush = () => {
      if (run.length >= STRUCTURE.TABLE_MIN_ROWS) {
        tables.push(run);
      }
      run = [];
    };

    for (const line of text.split('\n')) {
      const trimmed = line.trim();
      const cells = trimmed.length > 0 ? trimmed.split(COLUMN_GAP) : [];

      if (cells.length < STRUCTURE.TABLE_MIN_COLUMNS) {
        flush();
        continue;
      }
      if (run.length > 0 && run[0].length !== cells.length) {
        flush();
      }
      run.push(cells);
    }
    flush();

    return tables;
  }
}
