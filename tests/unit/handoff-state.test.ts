/**
 * X-Q state machine tests
 */
import { describe, it, expect } from 'vitest';
import {
  HANDOFF_BUCKETS,
  mapBuckets,
  matchesBucket,
  planClaim,
  planComplete,
  stateOfBucket,
} from '../../src/services/handoff-state.js';

const [handoffBucket, reviewBucket] = HANDOFF_BUCKETS;
const claimA = { by: 'sessionA', at: '2025-03-12T10:00:00.000Z' };

describe('bucket matching', () => {
  it('should create buckets in handoff, review, filed order', () => {
    expect(HANDOFF_BUCKETS.map((b) => b.title)).toEqual(['📬 Handoff', '🔍 Review', '✅ Filed']);
  });

  it('should match the emoji title and the bare name in any case', () => {
    expect(matchesBucket('📬 Handoff', handoffBucket)).toBe(true);
    expect(matchesBucket('handoff', handoffBucket)).toBe(true);
    expect(matchesBucket('  🔍 review', reviewBucket)).toBe(true);
  });

  it('should not match other buckets', () => {
    expect(matchesBucket('Handoff Archive', handoffBucket)).toBe(false);
    expect(matchesBucket('Review', handoffBucket)).toBe(false);
  });

  it('should map each state to the first matching bucket', () => {
    const ids = mapBuckets([
      { id: 1, title: 'To Do' },
      { id: 2, title: 'Handoff' },
      { id: 3, title: '📬 Handoff' },
      { id: 4, title: 'Review' },
    ]);

    expect(ids).toEqual({ handoff: 2, review: 4 });
  });

  it('should derive state from bucket membership', () => {
    const ids = { handoff: 2, review: 4 };

    expect(stateOfBucket(4, ids)).toBe('review');
    expect(stateOfBucket(99, ids)).toBeNull();
    expect(stateOfBucket(null, ids)).toBeNull();
  });
});

describe('planClaim', () => {
  it('should move an unclaimed handoff item to review', () => {
    expect(planClaim({ state: 'handoff', claim: null, claimCount: 0 })).toEqual({
      ok: true,
      next: 'review',
    });
  });

  it('should refuse items already in review', () => {
    expect(planClaim({ state: 'review', claim: claimA, claimCount: 1 })).toEqual({
      ok: false,
      kind: 'AlreadyClaimed',
      reason: 'task is in review, not waiting in handoff',
    });
  });

  it('should refuse items outside the X-Q buckets', () => {
    expect(planClaim({ state: null, claim: null, claimCount: 0 })).toEqual({
      ok: false,
      kind: 'AlreadyClaimed',
      reason: 'task is outside the X-Q buckets, not waiting in handoff',
    });
  });

  it('should refuse handoff items that still carry a claim', () => {
    expect(planClaim({ state: 'handoff', claim: claimA, claimCount: 1 })).toEqual({
      ok: false,
      kind: 'AlreadyClaimed',
      reason: 'task is already claimed by sessionA',
    });
  });
});

describe('planComplete', () => {
  it('should file a review item claimed by the caller', () => {
    expect(planComplete({ state: 'review', claim: claimA, claimCount: 1 }, 'sessionA')).toEqual({
      ok: true,
      next: 'filed',
    });
  });

  it('should refuse a caller that does not hold the claim', () => {
    expect(planComplete({ state: 'review', claim: claimA, claimCount: 1 }, 'sessionB')).toEqual({
      ok: false,
      kind: 'NotClaimedByCaller',
      reason: 'task is claimed by sessionA, not sessionB',
    });
  });

  it('should refuse items not in review', () => {
    expect(planComplete({ state: 'handoff', claim: null, claimCount: 0 }, 'sessionA')).toEqual({
      ok: false,
      kind: 'NotClaimedByCaller',
      reason: 'task is in handoff, not in review',
    });
  });

  it('should refuse review items without a claim', () => {
    const result = planComplete({ state: 'review', claim: null, claimCount: 0 }, 'sessionA');
    expect(result).toEqual({
      ok: false,
      kind: 'NotClaimedByCaller',
      reason: 'task carries no claim marker',
    });
  });

  it('should refuse items with more than one claim marker', () => {
    const result = planComplete({ state: 'review', claim: claimA, claimCount: 2 }, 'sessionA');
    expect(result).toEqual({
      ok: false,
      kind: 'NotClaimedByCaller',
      reason: 'task carries 2 claim markers',
    });
  });
});
