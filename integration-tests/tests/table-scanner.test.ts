/**
 * Markdown Table Scanner Tests
 */

import {
  parseTableRow,
  isDelimiterRow,
  isHeaderRow,
  scanKeyValueRow,
  scanHeaderDataRows,
  extractFromTables,
  ExtractionResultBuilder,
} from '@contract-ocr/shared';

function scan(markdown: string) {
  const builder = new ExtractionResultBuilder();
  extractFromTables(markdown, builder);
  return builder.build();
}

describe('parseTableRow', () => {
  it('should return null for lines without pipes', () => {
    expect(parseTableRow('甲方：北京星河科技有限公司')).toBeNull();
  });

  it('should require at least three parts after splitting', () => {
    expect(parseTableRow('甲方 | 北京星河科技有限公司')).toBeNull();
  });

  it('should drop the empty edge cells of a framed row', () => {
    expect(parseTableRow('  | 甲方 |  北京星河科技有限公司 |  ')).toEqual(['甲方', '北京星河科技有限公司']);
  });

  it('should accept unframed rows', () => {
    expect(parseTableRow('Party A | Acme Corp | note')).toEqual(['Party A', 'Acme Corp', 'note']);
  });

  it('should return null when every cell is empty', () => {
    expect(parseTableRow('| | |')).toBeNull();
  });
});

describe('row classification', () => {
  it('should detect alignment rows', () => {
    expect(isDelimiterRow(['---', ':---:', '--:'])).toBe(true);
    expect(isDelimiterRow(['---', 'Acme'])).toBe(false);
  });

  it('should detect header rows by exact label', () => {
    expect(isHeaderRow(['Party A', 'Party B'])).toBe(true);
    expect(isHeaderRow(['合同金额', '备注'])).toBe(true);
    expect(isHeaderRow(['Party A Name', 'Notes'])).toBe(false);
  });
});

describe('scanKeyValueRow', () => {
  it('should map the first cell to a field by substring', () => {
    expect(scanKeyValueRow(['Contract Amount (USD)', '1,000'], 'row')).toEqual([
      { key: 'contract_amount', value: '1,000', source: 'row' },
    ]);
  });

  it('should recognise every termination label', () => {
    expect(scanKeyValueRow(['有效期至', '2025年01月01日'], 'row')).toEqual([
      { key: 'termination_date', value: '2025年01月01日', source: 'row' },
    ]);
    expect(scanKeyValueRow(['Termination Date', '2025-01-01'], 'row')).toEqual([
      { key: 'termination_date', value: '2025-01-01', source: 'row' },
    ]);
  });

  it('should need a value cell', () => {
    expect(scanKeyValueRow(['甲方'], 'row')).toEqual([]);
  });

  it('should skip header rows whose second cell is another label', () => {
    expect(scanKeyValueRow(['Party A', 'Party B'], 'row')).toEqual([]);
  });
});

describe('scanHeaderDataRows', () => {
  it('should read values at the header column positions', () => {
    const proposals = scanHeaderDataRows(
      ['Party A', 'Party B', 'Total Amount'],
      ['Acme Corp', 'Globex Ltd', 'USD 5,000'],
      '| Acme Corp | Globex Ltd | USD 5,000 |'
    );

    expect(proposals).toEqual([
      { key: 'party_a', value: 'Acme Corp', source: '| Acme Corp | Globex Ltd | USD 5,000 |' },
      { key: 'party_b', value: 'Globex Ltd', source: '| Acme Corp | Globex Ltd | USD 5,000 |' },
      { key: 'contract_amount', value: 'USD 5,000', source: '| Acme Corp | Globex Ltd | USD 5,000 |' },
    ]);
  });

  it('should skip columns missing from a short data row', () => {
    const proposals = scanHeaderDataRows(['甲方', '乙方'], ['北京星河科技有限公司'], 'data');

    expect(proposals).toEqual([{ key: 'party_a', value: '北京星河科技有限公司', source: 'data' }]);
  });

  it('should propose nothing without known headers', () => {
    expect(scanHeaderDataRows(['Name', 'Value'], ['a', 'b'], 'data')).toEqual([]);
  });
});

describe('extractFromTables', () => {
  it('should read a header table that opens the block', () => {
    const result = scan(
      [
        '| Party A | Party B | Total Amount | Signature Date |',
        '| --- | --- | --- | --- |',
        '| Acme Corp | Globex Ltd | USD 5,000 | 2024-01-02 |',
      ].join('\n')
    );

    expect(result.fields).toEqual({
      party_a: 'Acme Corp',
      party_b: 'Globex Ltd',
      contract_amount: 'USD 5,000',
      sign_date: '2024-01-02',
      effective_date: null,
      termination_date: null,
    });
    expect(result.sources.party_a).toBe('| Acme Corp | Globex Ltd | USD 5,000 | 2024-01-02 |');
  });

  it('should read the line right after the header when there is no alignment row', () => {
    const result = scan('| 甲方 | 乙方 |\n| 北京星河科技有限公司 | 上海明远数字有限公司 |');

    expect(result.fields.party_a).toBe('北京星河科技有限公司');
    expect(result.fields.party_b).toBe('上海明远数字有限公司');
  });

  it('should not treat a header row below a title as a header table', () => {
    const result = scan('# Parties\n| Party A | Party B |\n| Acme Corp | Globex Ltd |');

    expect(result.fields.party_a).toBeNull();
    expect(result.fields.party_b).toBeNull();
  });

  it('should keep key/value rows that start the block', () => {
    const result = scan('| 甲方 | 北京星河科技有限公司 |\n| 乙方 | 上海明远数字有限公司 |');

    expect(result.fields.party_a).toBe('北京星河科技有限公司');
    expect(result.fields.party_b).toBe('上海明远数字有限公司');
  });

  it('should handle CRLF line endings', () => {
    const result = scan('\r\n| 签署日期 | 2024年05月12日 |\r\n| 生效日期 | 2024年05月13日 |\r\n');

    expect(result.fields.sign_date).toBe('2024年05月12日');
    expect(result.fields.effective_date).toBe('2024年05月13日');
    expect(result.sources.sign_date).toBe('| 签署日期 | 2024年05月12日 |');
  });

  it('should treat form feeds and Unicode separators as line breaks', () => {
    const result = scan('| 甲方 | 北京星河科技有限公司 |\f| 乙方 | 上海明远数字有限公司 |\u2028| 签署日期 | 2024年05月12日 |');

    expect(result.fields.party_a).toBe('北京星河科技有限公司');
    expect(result.fields.party_b).toBe('上海明远数字有限公司');
    expect(result.fields.sign_date).toBe('2024年05月12日');
    expect(result.sources.party_b).toBe('| 乙方 | 上海明远数字有限公司 |');
  });

  it('should keep the first value for a repeated field', () => {
    const result = scan('\n| Amount | USD 100 |\n| Total Amount | USD 200 |');

    expect(result.fields.contract_amount).toBe('USD 100');
    expect(result.origins.contract_amount).toBe('table');
  });
});
