/**
 * Markdown Table Scanner
 *
 * Recovers contract fields from pipe tables without a full Markdown parser.
 * Two table shapes are recognised:
 *
 * Key/value rows:
 *   | 甲方     | 北京星河科技有限公司 |
 *   | 合同金额 | 人民币 120,000 元   |
 *
 * Header row followed by a data row (first line of a block only):
 *   | Party A | Party B | Total Amount |
 *   | Acme    | Globex  | USD 5,000    |
 */

import { FIELD_KEYS } from '../../types';
import { ALL_TABLE_HEADERS, TABLE_HEADERS, isKnownHeaderLabel } from './patterns';
import type { ExtractionResultBuilder, FieldProposal } from './result';

const DELIMITER_CELL = /^:?-+:?$/;

/**
 * Split a pipe-delimited line into its non-empty trimmed cells.
 * Returns null when the line is not a table row.
 */
export function parseTableRow(line: string): string[] | null {
  if (!line.includes('|')) return null;

  const parts = line.trim().split('|').map((cell) => cell.trim());
  // minimal row: | header | value |
  if (parts.length < 3) return null;

  const cells = parts.filter((cell) => cell.length > 0);
  return cells.length > 0 ? cells : null;
}

/** `| --- | :---: |` alignment rows carry no data */
export function isDelimiterRow(cells: readonly string[]): boolean {
  return cells.length > 0 && cells.every((cell) => DELIMITER_CELL.test(cell));
}

/** True when any cell is exactly a known header label */
export function isHeaderRow(cells: readonly string[]): boolean {
  return cells.some((cell) => ALL_TABLE_HEADERS.has(cell.toLowerCase()));
}

/**
 * Key/value mode: the first cell names the field, the second holds its value.
 * A second cell that is itself a header label means the row is a header row,
 * so nothing is proposed for it.
 */
export function scanKeyValueRow(cells: readonly string[], line: string): FieldProposal[] {
  if (cells.length < 2) return [];

  const label = cells[0].toLowerCase();
  const value = cells[1];
  if (isKnownHeaderLabel(value)) return [];

  return FIELD_KEYS.filter((key) => TABLE_HEADERS[key].some((header) => label.includes(header))).map(
    (key) => ({ key, value, source: line })
  );
}

/**
 * Header/data mode: map header labels to column positions and read the
 * values at the same positions in the data row.
 */
export function scanHeaderDataRows(
  headerCells: readonly string[],
  dataCells: readonly string[],
  dataLine: string
): FieldProposal[] {
  if (!isHeaderRow(headerCells)) return [];

  const positions = new Map<string, number>();
  headerCells.forEach((cell, pos) => positions.set(cell.toLowerCase(), pos));

  const proposals: FieldProposal[] = [];
  for (const key of FIELD_KEYS) {
    for (const header of TABLE_HEADERS[key]) {
      const pos = positions.get(header);
      if (pos !== undefined && pos < dataCells.length) {
        proposals.push({ key, value: dataCells[pos], source: dataLine });
      }
    }
  }
  return proposals;
}

/**
 * The row following a header row, skipping a single alignment row.
 */
function findDataRow(lines: readonly string[], headerIdx: number): { cells: string[]; line: string } | null {
  for (let idx = headerIdx + 1; idx < lines.length && idx <= headerIdx + 2; idx++) {
    const cells = parseTableRow(lines[idx]);
    if (!cells) return null;
    if (idx === headerIdx + 1 && isDelimiterRow(cells)) continue;
    return { cells, line: lines[idx] };
  }
  return null;
}

/** Line breaks, including form feeds and Unicode line/paragraph separators */
const LINE_BREAK = /\r\n|[\n\v\f\r\x1c-\x1e\x85\u2028\u2029]/;

/**
 * Scan every line of a markdown block and record table-derived fields.
 */
export function extractFromTables(markdownText: string, result: ExtractionResultBuilder): void {
  const lines = markdownText.split(LINE_BREAK);

  lines.forEach((line, idx) => {
    const cells = parseTableRow(line);
    if (!cells) return;

    for (const proposal of scanKeyValueRow(cells, line)) {
      result.propose(proposal, 'table');
    }

    // Header/data tables are only recognised when the header opens the block
    if (idx === 0 && isHeaderRow(cells)) {
      const dataRow = findDataRow(lines, idx);
      if (dataRow) {
        for (const proposal of scanHeaderDataRows(cells, dataRow.cells, dataRow.line)) {
          result.propose(proposal, 'table');
        }
      }
    }
  });
}
