import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  CredentialStore,
  parseCredentialList,
} from '../src/auth/credential-store.js';
import { describeToken, timingSafeEqualUtf8 } from '../src/crypto.js';

describe('parseCredentialList', () => {
  it('trims entries and drops blanks', () => {
    assert.deepEqual(parseCredentialList('  a@b ,  ,c@d'), ['a@b', 'c@d']);
  });

  it('returns an empty list for missing or blank input', () => {
    assert.deepEqual(parseCredentialList(undefined), []);
    assert.deepEqual(parseCredentialList(''), []);
    assert.deepEqual(parseCredentialList(' , ,'), []);
  });

  it('removes duplicates keeping first-seen order', () => {
    assert.deepEqual(parseCredentialList('k2, k1 ,k2,k3'), ['k2', 'k1', 'k3']);
  });
});

describe('CredentialStore', () => {
  it('resolves read-only and read-write tokens', () => {
    const store = CredentialStore.fromSources({
      readOnly: 'ro-key',
      readWrite: 'rw-key',
    });

    assert.equal(store.resolveRole('ro-key'), 'read-only');
    assert.equal(store.resolveRole('rw-key'), 'read-write');
    assert.equal(store.resolveRole('other'), undefined);
    assert.equal(store.resolveRole(''), undefined);
  });

  it('prefers read-write when a token is in both sets', () => {
    const store = CredentialStore.fromSources({
      readOnly: 'shared, ro-only',
      readWrite: 'shared',
    });

    assert.equal(store.hasReadOnly('shared'), true);
    assert.equal(store.hasReadWrite('shared'), true);
    assert.equal(store.resolveRole('shared'), 'read-write');
    assert.equal(store.resolveRole('ro-only'), 'read-only');
  });

  it('grants read-write to everyone when nothing is configured', () => {
    const store = CredentialStore.fromSources({});

    assert.equal(store.isOpenAccess(), true);
    assert.equal(store.resolveRole(''), 'read-write');
    assert.equal(store.resolveRole('anything'), 'read-write');
  });

  it('applies the legacy list as read-write when both sets are empty', () => {
    const store = CredentialStore.fromSources({ legacy: 'old-1, old-2' });

    assert.equal(store.isOpenAccess(), false);
    assert.equal(store.resolveRole('old-2'), 'read-write');
    assert.equal(store.resolveRole('new'), undefined);
    assert.deepEqual(store.describe(), { readOnly: 0, readWrite: 2 });
  });

  it('ignores the legacy list once a split list is configured', () => {
    const store = CredentialStore.fromSources({
      readOnly: ['ro-key'],
      legacy: 'old-1',
    });

    assert.equal(store.resolveRole('old-1'), undefined);
    assert.equal(store.resolveRole('ro-key'), 'read-only');
  });

  it('does not match a prefix of a configured token', () => {
    const store = CredentialStore.fromSources({ readWrite: 'test-secret' });

    assert.equal(store.resolveRole('test-secre'), undefined);
    assert.equal(store.resolveRole('test-secret '), undefined);
  });

  it('describes counts without exposing values', () => {
    const store = CredentialStore.fromSources({
      readOnly: 'a, b, a',
      readWrite: 'c',
    });

    assert.deepEqual(store.describe(), { readOnly: 2, readWrite: 1 });
    assert.equal(JSON.stringify(store.describe()).includes('"a"'), false);
  });
});

describe('token helpers', () => {
  it('compares tokens of differing lengths', () => {
    assert.equal(timingSafeEqualUtf8('test-secret', 'test-secret'), true);
    assert.equal(timingSafeEqualUtf8('test-secret', 'test-secret-2'), false);
    assert.equal(timingSafeEqualUtf8('', 'x'), false);
  });

  it('reveals at most a quarter of a token in log hints', () => {
    assert.equal(describeToken(''), '<empty>');
    assert.equal(describeToken('abc'), '…(3 chars)');
    assert.equal(describeToken('test-secret'), 'te…(11 chars)');
    assert.equal(describeToken('a-much-longer-test-token'), 'a-mu…(24 chars)');
  });
});
