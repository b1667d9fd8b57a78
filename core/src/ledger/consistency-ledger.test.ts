import { describe, expect, it } from 'vitest';
import { createConsistencyLedger } from './consistency-ledger.js';
import { LedgerErrorCode } from '../errors/index.js';

describe('createConsistencyLedger', () => {
  it('records adjacencies when neighbouring boundaries share an artifact', () => {
    const ledger = createConsistencyLedger();
    ledger.bindBoundary(1, 'start', 'k1', 'video-1');
    ledger.bindBoundary(1, 'end', 'k2', 'video-1');
    ledger.bindBoundary(2, 'start', 'k2', 'video-2');
    ledger.bindBoundary(2, 'end', 'k3', 'video-2');

    expect(ledger.adjacencies()).toEqual([{ left: 1, right: 2, artifactId: 'k2' }]);
    expect(ledger.boundary(2, 'start')).toEqual({ artifactId: 'k2', stepId: 'video-2' });
  });

  it('rejects a start that differs from the previous end', () => {
    const ledger = createConsistencyLedger();
    ledger.bindBoundary(1, 'end', 'k2', 'video-1');

    expect(() => ledger.bindBoundary(2, 'start', 'other', 'video-2')).toThrowError(
      expect.objectContaining({ code: LedgerErrorCode.ADJACENT_BOUNDARY_MISMATCH }),
    );
    expect(ledger.boundary(2, 'start')).toBeUndefined();
  });

  it('rejects an end that differs from the next start', () => {
    const ledger = createConsistencyLedger();
    ledger.bindBoundary(3, 'start', 'k3', 'video-3');

    expect(() => ledger.bindBoundary(2, 'end', 'k9', 'video-2')).toThrowError(
      expect.objectContaining({ code: LedgerErrorCode.ADJACENT_BOUNDARY_MISMATCH }),
    );
  });

  it('treats re-binding by the same step as a no-op and by another step as a violation', () => {
    const ledger = createConsistencyLedger();
    ledger.bindBoundary(1, 'start', 'k1', 'video-1');
    ledger.bindBoundary(1, 'start', 'k1', 'video-1');

    expect(() => ledger.bindBoundary(1, 'start', 'k1', 'video-x')).toThrowError(
      expect.objectContaining({ code: LedgerErrorCode.BOUNDARY_ALREADY_BOUND }),
    );
  });

  it('rejects non-positive segment indices', () => {
    const ledger = createConsistencyLedger();
    expect(() => ledger.bindBoundary(0, 'start', 'k1', 'video-0')).toThrowError(
      expect.objectContaining({ code: LedgerErrorCode.INVALID_SEGMENT_INDEX }),
    );
  });

  it('checks a batch without applying it', () => {
    const ledger = createConsistencyLedger();
    ledger.bindBoundary(1, 'end', 'k2', 'video-1');

    expect(() =>
      ledger.checkBindings(
        [
          { segment: 2, position: 'start', artifactId: 'k2' },
          { segment: 2, position: 'end', artifactId: 'k3' },
        ],
        'video-2',
      ),
    ).not.toThrow();
    expect(ledger.boundary(2, 'start')).toBeUndefined();

    expect(() =>
      ledger.checkBindings(
        [
          { segment: 3, position: 'end', artifactId: 'k4' },
          { segment: 4, position: 'start', artifactId: 'k5' },
        ],
        'video-3',
      ),
    ).toThrowError(expect.objectContaining({ code: LedgerErrorCode.ADJACENT_BOUNDARY_MISMATCH }));
  });

  it('releases every binding owned by a step', () => {
    const ledger = createConsistencyLedger();
    ledger.bindBoundary(1, 'start', 'k1', 'video-1');
    ledger.bindBoundary(1, 'end', 'k2', 'video-1');
    ledger.bindBoundary(2, 'start', 'k2', 'video-2');

    expect(ledger.release('video-1')).toBe(2);
    expect(ledger.snapshot().boundaries).toEqual([
      { segment: 2, start: { artifactId: 'k2', stepId: 'video-2' } },
    ]);
    ledger.bindBoundary(1, 'end', 'k2', 'video-1');
    expect(ledger.adjacencies()).toHaveLength(1);
  });

  it('locks flags in order without duplicates and reports differences', () => {
    const ledger = createConsistencyLedger();
    ledger.lockFlags(['red scarf', ' teal palette ', 'red scarf']);
    ledger.lockFlags(['round glasses']);

    expect(ledger.lockedFlags()).toEqual(['red scarf', 'teal palette', 'round glasses']);
    expect(ledger.checkFlags(['teal palette', 'rain'])).toEqual({
      missing: ['red scarf', 'round glasses'],
      added: ['rain'],
    });
  });
});
