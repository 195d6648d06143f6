/**
 * HTTP Status Table
 *
 * Recognised final-response status codes with their symbolic names (`not_found`) and
 * reason phrases. Status values are accepted unchecked when set on a
 * Context and resolved against this table when the response is committed.
 */

import STATUS_CODES from './status_codes.json';

export type StatusInput = number | string;

export interface StatusEntry {
  code: number;
  name: string;
  reason: string;
}

const BY_CODE = new Map<number, StatusEntry>();
const BY_NAME = new Map<string, StatusEntry>();

for (const entry of STATUS_CODES) {
  BY_CODE.set(entry.code, entry);
  BY_NAME.set(entry.name, entry);
}

/**
 * Look up a status by code or symbolic name, `undefined` when unknown
 */
export function lookupStatus(input: StatusInput): StatusEntry | undefined {
  if (typeof input === 'number') {
    return Number.isInteger(input) ? BY_CODE.get(input) : undefined;
  }
  return BY_NAME.get(input);
}

export function reasonPhrase(code: number): string {
  return BY_CODE.get(code)?.reason ?? 'Unknown Status';
}

export function isRedirectStatus(code: number): boolean {
  return code >= 300 && code < 400;
}

/** Statuses whose responses must not carry a body. */
export const NULL_BODY_STATUSES: ReadonlySet<number> = new Set([204, 205, 304]);
