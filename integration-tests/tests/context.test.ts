/**
 * Request Context Tests
 */

import {
  getContext,
  getCorrelationId,
  getDocumentId,
  runWithContext,
  runWithContextAsync,
  withDocumentId,
} from '@contract-ocr/shared';

describe('request context', () => {
  it('should be empty outside a request', () => {
    expect(getContext()).toBeUndefined();
    expect(getDocumentId()).toBeUndefined();
    expect(getCorrelationId()).toMatch(/^[0-9A-Z]{26}$/);
  });

  it('should carry the correlation id across awaits', async () => {
    const seen = await runWithContextAsync({ correlationId: 'corr-ctx-1' }, async () => {
      await new Promise((resolve) => setTimeout(resolve, 1));
      return getCorrelationId();
    });

    expect(seen).toBe('corr-ctx-1');
  });

  it('should scope a document id without losing the correlation id', () => {
    const seen = runWithContext({ correlationId: 'corr-ctx-2' }, () => {
      const inner = withDocumentId('contract_1', () => getContext());
      return { inner, outerDocumentId: getDocumentId() };
    });

    expect(seen.inner).toEqual({ correlationId: 'corr-ctx-2', documentId: 'contract_1' });
    expect(seen.outerDocumentId).toBeUndefined();
  });
});
