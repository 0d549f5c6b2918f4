/**
 * Contract Schema Tests
 */

import {
  validateContractFields,
  validateRunSummary,
  validateExtractRequest,
  validateSubmitContractRequest,
  extractContractFieldValues,
  emptyContractFields,
} from '@contract-ocr/shared';

describe('validateContractFields', () => {
  it('should accept extractor output', () => {
    const fields = extractContractFieldValues(['Party A: Aurora Analytics LLC\nEffective Date: 2024-03-20']);

    expect(validateContractFields(fields)).toEqual({ valid: true });
  });

  it('should accept all-null fields', () => {
    expect(validateContractFields(emptyContractFields()).valid).toBe(true);
  });

  it('should reject empty and untrimmed strings', () => {
    expect(validateContractFields({ ...emptyContractFields(), party_a: '' }).valid).toBe(false);
    expect(validateContractFields({ ...emptyContractFields(), party_b: ' Globex ' }).valid).toBe(false);
  });

  it('should reject missing and unknown keys', () => {
    const { party_a: _omitted, ...withoutPartyA } = emptyContractFields();

    const missing = validateContractFields(withoutPartyA);
    expect(missing.valid).toBe(false);
    expect(missing.errors).toEqual(["/: must have required property 'party_a'"]);

    expect(validateContractFields({ ...emptyContractFields(), notes: null }).valid).toBe(false);
  });
});

describe('validateRunSummary', () => {
  it('should accept a summary with inputs and fields', () => {
    expect(validateRunSummary({ inputs: ['/data/lease.pdf'], fields: emptyContractFields() }).valid).toBe(true);
  });

  it('should validate nested fields', () => {
    expect(
      validateRunSummary({ inputs: [], fields: { ...emptyContractFields(), sign_date: 20240101 } }).valid
    ).toBe(false);
  });
});

describe('request schemas', () => {
  it('should require a segments array for extraction', () => {
    expect(validateExtractRequest({ segments: ['a', { markdown: 'b' }, 3] }).valid).toBe(true);
    expect(validateExtractRequest({ segments: 'a' }).valid).toBe(false);
    expect(validateExtractRequest(null).valid).toBe(false);
  });

  it('should require at least one input path for submission', () => {
    expect(validateSubmitContractRequest({ inputs: ['/data/a.pdf'], output_dir: 'run-1' }).valid).toBe(true);
    expect(validateSubmitContractRequest({ inputs: [] }).valid).toBe(false);
    expect(validateSubmitContractRequest({ inputs: ['/data/a.pdf'], priority: 1 }).valid).toBe(false);
  });
});
