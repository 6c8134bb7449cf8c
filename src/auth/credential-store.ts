import { parseList } from '../config/env-parsers.js';

import { timingSafeEqualUtf8 } from '../crypto.js';

import type { Role } from './roles.js';

export interface CredentialSources {
  readonly readOnly?: readonly string[] | string;
  readonly readWrite?: readonly string[] | string;
  /** Pre-split single list; read-write only when both split lists are empty. */
  readonly legacy?: readonly string[] | string;
}

export interface CredentialCounts {
  readonly readOnly: number;
  readonly readWrite: number;
}

export function parseCredentialList(raw: string | undefined): string[] {
  return parseList(raw);
}

function normalizeSource(
  source: readonly string[] | string | undefined
): string[] {
  if (source === undefined) return [];
  if (typeof source === 'string') return parseCredentialList(source);
  return parseCredentialList(source.join(','));
}

function containsToken(set: readonly string[], token: string): boolean {
  if (!token) return false;
  // No short-circuit, so a match position is not observable through timing.
  let found = false;
  for (const candidate of set) {
    if (timingSafeEqualUtf8(candidate, token)) found = true;
  }
  return found;
}

/**
 * Static bearer credentials split into a read-only and a read-write set.
 * Immutable after construction; only membership and counts are exposed.
 */
export class CredentialStore {
  private readonly readOnly: readonly string[];
  private readonly readWrite: readonly string[];

  private constructor(readOnly: string[], readWrite: string[]) {
    this.readOnly = Object.freeze(readOnly);
    this.readWrite = Object.freeze(readWrite);
  }

  static fromSources(sources: CredentialSources): CredentialStore {
    const readOnly = normalizeSource(sources.readOnly);
    const readWrite = normalizeSource(sources.readWrite);

    if (readOnly.length === 0 && readWrite.length === 0) {
      return new CredentialStore([], normalizeSource(sources.legacy));
    }
    return new CredentialStore(readOnly, readWrite);
  }

  /** True when no credential is configured at all: every caller is read-write. */
  isOpenAccess(): boolean {
    return this.readOnly.length === 0 && this.readWrite.length === 0;
  }

  hasReadWrite(token: string): boolean {
    return containsToken(this.readWrite, token);
  }

  hasReadOnly(token: string): boolean {
    return containsToken(this.readOnly, token);
  }

  /** Read-write membership wins when a token sits in both sets. */
  resolveRole(token: string): Role | undefined {
    if (this.isOpenAccess()) return 'read-write';
    if (this.hasReadWrite(token)) return 'read-write';
    if (this.hasReadOnly(token)) return 'read-only';
    return undefined;
  }

  describe(): CredentialCounts {
    return {
      readOnly: this.readOnly.length,
      readWrite: this.readWrite.length,
    };
  }
}
