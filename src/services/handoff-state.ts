/**
 * X-Q item state machine
 *
 *   handoff --claim--> review --complete--> filed
 *
 * Planners are pure: they look at a snapshot of the remote task and either
 * name the next state or the error kind, and never touch the remote service.
 */

import type { ClaimMarker, HandoffBucketIds, HandoffState, RemoteBucket } from '../types/index.js';
import type { HandoffErrorKind } from '../utils/index.js';

export interface HandoffBucket {
  state: HandoffState;
  title: string;
  name: string;
}

/** Creation order matters: a partially failed setup converges on rerun */
export const HANDOFF_BUCKETS: readonly HandoffBucket[] = [
  { state: 'handoff', title: '📬 Handoff', name: 'Handoff' },
  { state: 'review', title: '🔍 Review', name: 'Review' },
  { state: 'filed', title: '✅ Filed', name: 'Filed' },
];

export interface ItemSnapshot {
  state: HandoffState | null;
  claim: ClaimMarker | null;
  claimCount: number;
}

export type TransitionResult =
  | { ok: true; next: HandoffState }
  | { ok: false; kind: HandoffErrorKind; reason: string };

/**
 * Strip leading emoji, punctuation and whitespace: "📬 Handoff" and "handoff" both match Handoff
 */
function bareTitle(title: string): string {
  return title.replace(/^[^\p{L}\p{N}]+/u, '').trim().toLowerCase();
}

export function matchesBucket(title: string, bucketDef: HandoffBucket): boolean {
  return title === bucketDef.title || bareTitle(title) === bucketDef.name.toLowerCase();
}

export function findBucket(
  buckets: RemoteBucket[],
  bucketDef: HandoffBucket
): RemoteBucket | undefined {
  return buckets.find((bucket) => matchesBucket(bucket.title, bucketDef));
}

/**
 * Map each X-Q state to the first matching bucket; missing states are left out
 */
export function mapBuckets(buckets: RemoteBucket[]): Partial<HandoffBucketIds> {
  const ids: Partial<HandoffBucketIds> = {};
  for (const bucketDef of HANDOFF_BUCKETS) {
    const bucket = findBucket(buckets, bucketDef);
    if (bucket) {
      ids[bucketDef.state] = bucket.id;
    }
  }
  return ids;
}

export function stateOfBucket(
  bucketId: number | null,
  ids: Partial<HandoffBucketIds>
): HandoffState | null {
  if (bucketId === null) {
    return null;
  }
  for (const bucketDef of HANDOFF_BUCKETS) {
    if (ids[bucketDef.state] === bucketId) {
      return bucketDef.state;
    }
  }
  return null;
}

function describe(state: HandoffState | null): string {
  return state === null ? 'outside the X-Q buckets' : `in ${state}`;
}

export function planClaim(snapshot: ItemSnapshot): TransitionResult {
  if (snapshot.state !== 'handoff') {
    return {
      ok: false,
      kind: 'AlreadyClaimed',
      reason: `task is ${describe(snapshot.state)}, not waiting in handoff`,
    };
  }
  if (snapshot.claim !== null || snapshot.claimCount > 0) {
    return {
      ok: false,
      kind: 'AlreadyClaimed',
      reason: `task is already claimed by ${snapshot.claim?.by ?? 'another session'}`,
    };
  }
  return { ok: true, next: 'review' };
}

export function planComplete(snapshot: ItemSnapshot, caller: string): TransitionResult {
  if (snapshot.state !== 'review') {
    return {
      ok: false,
      kind: 'NotClaimedByCaller',
      reason: `task is ${describe(snapshot.state)}, not in review`,
    };
  }
  if (snapshot.claim === null) {
    return { ok: false, kind: 'NotClaimedByCaller', reason: 'task carries no claim marker' };
  }
  if (snapshot.claimCount > 1) {
    return {
      ok: false,
      kind: 'NotClaimedByCaller',
      reason: `task carries ${snapshot.claimCount} claim markers`,
    };
  }
  if (snapshot.claim.by !== caller) {
    return {
      ok: false,
      kind: 'NotClaimedByCaller',
      reason: `task is claimed by ${snapshot.claim.by}, not ${caller}`,
    };
  }
  return { ok: true, next: 'filed' };
}
