/**
 * Contract Field Patterns
 *
 * Bilingual (Chinese/English) lookup tables for the two extraction passes:
 * - TABLE_HEADERS: header labels recognised in Markdown pipe tables
 * - FIELD_PATTERNS: ordered regular expressions for free-text fallback
 *
 * Dates are kept as the matched substring, e.g. "2024年05月12日",
 * "2024-05-12" or "March 18, 2024".
 */

import { FIELD_KEYS, type FieldKey } from '../../types';
import type { FieldProposal } from './result';

/** ASCII or full-width digit; OCR of Chinese documents often emits the latter */
const DIGIT = '[0-9０-９]';

/** Numeric date: 2024年05月12日, 2024-05-12, 2024/5/12 */
const NUMERIC_DATE = `(${DIGIT}{4}[年\\-/]${DIGIT}{1,2}[月\\-/]${DIGIT}{1,2}日?)`;

/** English month-name date: March 18, 2024 / Mar 18, 2024 */
const MONTH_NAME_DATE = `([A-Za-z]{3,9}\\s+${DIGIT}{1,2},\\s+${DIGIT}{4})`;

function pattern(source: string): RegExp {
  return new RegExp(source, 'i');
}

function freezeTable<T>(table: Record<FieldKey, T[]>): Readonly<Record<FieldKey, readonly T[]>> {
  for (const key of FIELD_KEYS) {
    Object.freeze(table[key]);
  }
  return Object.freeze(table);
}

/**
 * Candidate patterns per field, tried in order. Capture group 1 is the value.
 */
export const FIELD_PATTERNS = freezeTable<RegExp>({
  party_a: [
    pattern('(?:甲方|Party\\s*A)\\s*[:：]\\s*([^\\n，。,;；]+)'),
    pattern('Party\\s*A\\s*[-–]\\s*([^\\n]+)'),
  ],
  party_b: [
    pattern('(?:乙方|Party\\s*B)\\s*[:：]\\s*([^\\n，。,;；]+)'),
    pattern('Party\\s*B\\s*[-–]\\s*([^\\n]+)'),
  ],
  contract_amount: [
    pattern('(?:合同金额|Total\\s*Amount|Amount\\s*Due)\\s*[:：]\\s*([^\\n]+)'),
    pattern('(?:金额|payment)\\s*(?:为|is)\\s*([^\\n]+)'),
  ],
  sign_date: [
    pattern(`(?:签署日期|Date\\s*of\\s*Signature)\\s*[:：]\\s*${NUMERIC_DATE}`),
    pattern(`(?:Signed\\s*on)\\s*[:：]?\\s*${MONTH_NAME_DATE}`),
    pattern(`(?:Date\\s*of\\s*Signature)\\s*[:：]\\s*${MONTH_NAME_DATE}`),
  ],
  effective_date: [
    pattern(`(?:生效日期|Effective\\s*Date)\\s*[:：]\\s*${NUMERIC_DATE}`),
    pattern(`(?:effective\\s+as\\s+of)\\s*${MONTH_NAME_DATE}`),
    pattern(`(?:Effective\\s*Date)\\s*[:：]\\s*${MONTH_NAME_DATE}`),
  ],
  termination_date: [
    pattern(`(?:终止日期|Expiry\\s*Date)\\s*[:：]\\s*${NUMERIC_DATE}`),
    pattern(`(?:valid\\s+until)\\s*${MONTH_NAME_DATE}`),
    pattern(`(?:Expiry\\s*Date|Termination\\s*Date)\\s*[:：]\\s*${MONTH_NAME_DATE}`),
  ],
});

/**
 * Lower-case table header labels per field
 */
export const TABLE_HEADERS = freezeTable<string>({
  party_a: ['甲方', 'party a'],
  party_b: ['乙方', 'party b'],
  contract_amount: ['合同金额', 'total amount', 'amount'],
  sign_date: ['签署日期', 'signature date'],
  effective_date: ['生效日期', 'effective date'],
  termination_date: ['到期日期', '有效期至', 'expiry date', 'termination date'],
});

/** Every known header label, for header-row detection */
export const ALL_TABLE_HEADERS: ReadonlySet<string> = new Set(
  FIELD_KEYS.flatMap((key) => TABLE_HEADERS[key])
);

export function isKnownHeaderLabel(cell: string): boolean {
  return ALL_TABLE_HEADERS.has(cell.toLowerCase());
}

/**
 * Search text with a field's patterns in order and return the first match.
 */
export function matchFieldPattern(text: string, key: FieldKey): FieldProposal | null {
  for (const candidate of FIELD_PATTERNS[key]) {
    const match = text.match(candidate);
    if (match) {
      return { key, value: match[1] ?? '', source: match[0] };
    }
  }
  return null;
}
