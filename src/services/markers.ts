/**
 * Claim and destination markers
 *
 * Vikunja has no claim field, so X-Q state is written as reserved lines at the
 * end of the task description:
 *
 *   claimed:by=<session>;at=<iso8601>
 *   filed:to=<destination>
 *   filed:at=<iso8601>
 *   filed:notes=<notes>
 *
 * The queue only talks to a MarkerCodec, so the encoding can move to labels or
 * a custom field without touching the state machine.
 */

import type { ClaimMarker, FiledMarker } from '../types/index.js';

export interface MarkerState {
  body: string;
  claim: ClaimMarker | null;
  /** Number of claim lines found; more than one means the description was edited by hand */
  claimCount: number;
  filed: FiledMarker | null;
}

export interface MarkerCodec {
  read(description: string): MarkerState;
  write(state: Omit<MarkerState, 'claimCount'>): string;
}

const MARKER = String.raw`(claimed:by=[^;\n<]*;at=[^\s<]*|filed:(?:to|at|notes)=[^\n<]*?)`;
const MARKER_PARAGRAPH = new RegExp(String.raw`<p>[ \t]*${MARKER}[ \t]*</p>`, 'g');
const MARKER_LINE = new RegExp(
  String.raw`^[ \t]*(?:<p>)?[ \t]*${MARKER}[ \t]*(?:</p>)?[ \t]*$`,
  'gm'
);

const CLAIM_TOKEN = /^claimed:by=([^;]*);at=(.*)$/;
const FILED_TOKEN = /^filed:(to|at|notes)=(.*)$/;

function flatten(value: string): string {
  return value.replace(/[\r\n]+/g, ' ').trim();
}

function encodeValue(value: string): string {
  return flatten(value).replace(/&/g, '&amp;').replace(/</g, '&lt;');
}

function decodeValue(value: string): string {
  return value.replace(/&lt;/g, '<').replace(/&amp;/g, '&').trim();
}

/**
 * Session IDs end at ';' in the claim line and are never entity-encoded
 */
function encodeSession(value: string): string {
  return flatten(value).replace(/[;\s<&]+/g, '_');
}

function read(description: string): MarkerState {
  const tokens: string[] = [];
  const collect = (_match: string, token: string): string => {
    tokens.push(token);
    return '';
  };

  const body = description
    .replace(MARKER_PARAGRAPH, collect)
    .replace(MARKER_LINE, collect)
    .trimEnd();

  const claims: ClaimMarker[] = [];
  const filedParts: Partial<Record<'to' | 'at' | 'notes', string>> = {};

  for (const token of tokens) {
    const claim = CLAIM_TOKEN.exec(token);
    if (claim) {
      claims.push({ by: decodeValue(claim[1]), at: decodeValue(claim[2]) });
      continue;
    }

    const filed = FILED_TOKEN.exec(token);
    if (filed) {
      const key = filed[1];
      if (key === 'to' || key === 'at' || key === 'notes') {
        filedParts[key] = decodeValue(filed[2]);
      }
    }
  }

  let filed: FiledMarker | null = null;
  if (filedParts.to !== undefined) {
    filed = { to: filedParts.to, at: filedParts.at ?? '' };
    if (filedParts.notes) {
      filed.notes = filedParts.notes;
    }
  }

  return {
    body,
    claim: claims[0] ?? null,
    claimCount: claims.length,
    filed,
  };
}

function write(state: Omit<MarkerState, 'claimCount'>): string {
  const lines: string[] = [];

  if (state.claim) {
    lines.push(`claimed:by=${encodeSession(state.claim.by)};at=${encodeValue(state.claim.at)}`);
  }
  if (state.filed) {
    lines.push(`filed:to=${encodeValue(state.filed.to)}`);
    lines.push(`filed:at=${encodeValue(state.filed.at)}`);
    if (state.filed.notes) {
      lines.push(`filed:notes=${encodeValue(state.filed.notes)}`);
    }
  }

  const body = state.body.trimEnd();
  if (lines.length === 0) {
    return body;
  }
  return body ? `${body}\n\n${lines.join('\n')}` : lines.join('\n');
}

export const descriptionMarkers: MarkerCodec = { read, write };

export function sameClaim(a: ClaimMarker | null, b: ClaimMarker | null): boolean {
  return a !== null && b !== null && a.by === b.by && a.at === b.at;
}

/**
 * The session ID as it will read back from a description
 */
export function normalizeSessionId(sessionId: string): string {
  return encodeSession(sessionId);
}
