/**
 * Contract Extraction Result
 *
 * Collects field values for a single extraction call. The first value
 * written for a field is final: later proposals for the same field are
 * ignored, which is how table matches take precedence over patterns.
 */

import {
  FIELD_KEYS,
  type ContractExtractionResult,
  type ContractFields,
  type FieldKey,
  type FieldOrigin,
} from '../../types';

/**
 * A candidate value produced by one of the extraction passes
 */
export interface FieldProposal {
  key: FieldKey;
  value: string;
  source: string;
}

export function emptyContractFields(): ContractFields {
  return {
    party_a: null,
    party_b: null,
    contract_amount: null,
    sign_date: null,
    effective_date: null,
    termination_date: null,
  };
}

export class ExtractionResultBuilder {
  private readonly fields: ContractFields = emptyContractFields();
  private readonly sources: Partial<Record<FieldKey, string>> = {};
  private readonly origins: Partial<Record<FieldKey, FieldOrigin>> = {};

  isSet(key: FieldKey): boolean {
    return this.fields[key] !== null;
  }

  /**
   * Record a proposal unless the field is already set or the value is blank.
   * Returns true when the proposal was accepted.
   */
  propose(proposal: FieldProposal, origin: FieldOrigin): boolean {
    if (this.isSet(proposal.key)) return false;

    const cleaned = proposal.value.trim();
    if (!cleaned) return false;

    this.fields[proposal.key] = cleaned;
    this.sources[proposal.key] = proposal.source.trim();
    this.origins[proposal.key] = origin;
    return true;
  }

  pendingKeys(): FieldKey[] {
    return FIELD_KEYS.filter((key) => !this.isSet(key));
  }

  build(): ContractExtractionResult {
    return Object.freeze({
      fields: Object.freeze({ ...this.fields }),
      sources: Object.freeze({ ...this.sources }),
      origins: Object.freeze({ ...this.origins }),
    });
  }
}

export function getMissingFields(result: ContractExtractionResult): FieldKey[] {
  return FIELD_KEYS.filter((key) => result.fields[key] === null);
}
