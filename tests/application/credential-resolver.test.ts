import { describe, it, expect, beforeEach } from 'vitest';
import { createHash } from 'node:crypto';
import { CredentialResolver, hashSecret, issueCredential } from '../../src/application/credential-resolver.js';
import { MemoryBackend, MemoryStore } from '../../src/infrastructure/store/index.js';
import { makeCredential } from '../helpers.js';

describe('hashSecret', () => {
  it('is the SHA-256 hex digest of the raw secret', () => {
    expect(hashSecret('rk_test')).toBe(createHash('sha256').update('rk_test').digest('hex'));
  });
});

describe('issueCredential', () => {
  it('stores the hash of the returned secret, never the secret', () => {
    const { secret, credential } = issueCredential({ kind: 'edit_token', name: 'tok', listing_id: 'l1' });

    expect(secret.startsWith('et_')).toBe(true);
    expect(credential.key_hash).toBe(hashSecret(secret));
    expect(credential.listing_id).toBe('l1');
    expect(credential.rate_limit).toBeNull();
  });

  it('keys the record by an opaque id rather than the hash', () => {
    const { credential } = issueCredential({ kind: 'regular', name: 'k' });

    expect(credential.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
    expect(credential.id).not.toBe(credential.key_hash);
  });

  it('prefixes API keys with rk_', () => {
    expect(issueCredential({ kind: 'regular', name: 'k' }).secret.startsWith('rk_')).toBe(true);
  });
});

describe('CredentialResolver', () => {
  let store: MemoryStore;
  let resolver: CredentialResolver;

  beforeEach(async () => {
    store = new MemoryStore(new MemoryBackend(), 'requests');
    resolver = new CredentialResolver(store);

    await store.append('credentials', makeCredential({ id: 'admin-1', key_hash: hashSecret('admin-secret'), kind: 'admin' }));
    await store.append('credentials', makeCredential({ id: 'reg-1', key_hash: hashSecret('regular-secret'), rate_limit: 50 }));
    await store.append(
      'credentials',
      makeCredential({ id: 'tok-1', key_hash: hashSecret('edit-secret'), kind: 'edit_token', listing_id: 'listing-a' }),
    );
  });

  it('resolves an admin key', async () => {
    const identity = await resolver.resolve({ editToken: null, apiKey: 'admin-secret', client: '1.1.1.1' });
    expect(identity).toEqual({ kind: 'admin', credential_id: 'admin-1', rate_limit: null });
  });

  it('resolves a regular key with its override', async () => {
    const identity = await resolver.resolve({ editToken: null, apiKey: 'regular-secret', client: '1.1.1.1' });
    expect(identity).toEqual({ kind: 'regular', credential_id: 'reg-1', rate_limit: 50 });
  });

  it('resolves an edit token to its listing', async () => {
    const identity = await resolver.resolve({ editToken: 'edit-secret', apiKey: null, client: '1.1.1.1' });
    expect(identity).toEqual({ kind: 'edit_token', credential_id: 'tok-1', listing_id: 'listing-a' });
  });

  it('prefers a live edit token over an API key', async () => {
    const identity = await resolver.resolve({ editToken: 'edit-secret', apiKey: 'admin-secret', client: '1.1.1.1' });
    expect(identity.kind).toBe('edit_token');
  });

  it('falls through to the API key when the edit token is unknown', async () => {
    const identity = await resolver.resolve({ editToken: 'nope', apiKey: 'regular-secret', client: '1.1.1.1' });
    expect(identity.kind).toBe('regular');
  });

  it('ignores an edit token presented as an API key', async () => {
    const identity = await resolver.resolve({ editToken: null, apiKey: 'edit-secret', client: '9.9.9.9' });
    expect(identity).toEqual({ kind: 'anonymous', client: '9.9.9.9' });
  });

  it('ignores an API key presented in the edit-token slot', async () => {
    const identity = await resolver.resolve({ editToken: 'admin-secret', apiKey: null, client: '9.9.9.9' });
    expect(identity).toEqual({ kind: 'anonymous', client: '9.9.9.9' });
  });

  it('treats unknown secrets as anonymous', async () => {
    const identity = await resolver.resolve({ editToken: null, apiKey: 'rk_unknown', client: '9.9.9.9' });
    expect(identity).toEqual({ kind: 'anonymous', client: '9.9.9.9' });
  });

  it('stops resolving a revoked key', async () => {
    await store.remove('credentials', 'reg-1');
    const identity = await resolver.resolve({ editToken: null, apiKey: 'regular-secret', client: '9.9.9.9' });
    expect(identity.kind).toBe('anonymous');
  });
});
