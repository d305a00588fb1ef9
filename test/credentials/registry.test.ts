import { test } from 'node:test';
import assert from 'node:assert/strict';

import { InMemoryMetadataStore } from '../../src/credentials/metadata.js';
import { CredentialError, CredentialRegistry, maskSecret } from '../../src/credentials/registry.js';
import { credentialEntry, silentLogger, testClient, testRegistry, upstreamError } from '../helpers/fakes.js';

const env = {
  KEY_ALPHA: 'alpha-secret-1111',
  KEY_BRAVO: 'bravo-secret-2222',
  KEY_CHARLIE: 'charlie-secret-3333',
};

const credentialFailure = async (promise: Promise<unknown>): Promise<CredentialError> => {
  try {
    await promise;
  } catch (err) {
    assert.ok(err instanceof CredentialError);
    return err;
  }
  assert.fail('expected a CredentialError');
};

test('maskSecret keeps only the last four characters', () => {
  assert.equal(maskSecret('abcdefgh1234'), '****-****-****-1234');
  assert.equal(maskSecret('abc'), '****');
});

test('register validates and persists scopes from key info', async () => {
  const { client, calls } = testClient(() => ({ access_type: 'Limited Access', selections: { faction: {}, user: {} } }));
  const store = new InMemoryMetadataStore();
  const registry = await CredentialRegistry.open({
    store,
    client,
    env,
    now: () => new Date('2024-05-01T00:00:00Z'),
    logger: silentLogger,
  });

  const { summary, validation } = await registry.register('alpha', 'KEY_ALPHA', 'user-1', { validate: true });

  assert.equal(calls[0].pathname, '/key');
  assert.deepEqual(validation, {
    valid: true,
    scopes: ['faction', 'user'],
    tier: 'Limited Access',
    validatedAt: '2024-05-01T00:00:00.000Z',
  });
  assert.equal(summary.maskedKey, '****-****-****-1111');
  const saved = await store.load();
  assert.deepEqual(saved.keys.alpha, {
    owner: 'user-1',
    envVar: 'KEY_ALPHA',
    accessLevel: 'Limited Access',
    scopes: ['faction', 'user'],
    lastValidated: '2024-05-01T00:00:00.000Z',
    keyType: 'user',
  });
});

test('register rejects duplicate aliases and unset environment variables', async () => {
  const { client } = testClient(() => ({}));
  const registry = await testRegistry(client, { alpha: credentialEntry({ envVar: 'KEY_ALPHA' }) }, env);

  assert.equal((await credentialFailure(registry.register('alpha', 'KEY_BRAVO', 'user-1'))).code, 'duplicate_alias');
  assert.equal((await credentialFailure(registry.register('delta', 'KEY_DELTA', 'user-1'))).code, 'missing_secret');
});

test('a failed validation is reported without throwing', async () => {
  const { client } = testClient(() => upstreamError(2, 'Incorrect key'));
  const registry = await testRegistry(client, { alpha: credentialEntry({ envVar: 'KEY_ALPHA' }) }, env);

  assert.deepEqual(await registry.validate('alpha'), { valid: false, error: 'API error 2: Incorrect key' });
});

test('remove requires the owner or an administrator', async () => {
  const { client } = testClient(() => ({}));
  const registry = await testRegistry(client, { alpha: credentialEntry({ envVar: 'KEY_ALPHA', owner: 'user-1' }) }, env);

  const denied = await credentialFailure(registry.remove('alpha', { id: 'user-2', isAdmin: false }));
  assert.equal(denied.code, 'not_owner');

  await registry.remove('alpha', { id: 'user-2', isAdmin: true });
  assert.equal(registry.resolve('alpha'), null);
  assert.equal((await credentialFailure(registry.validate('alpha'))).code, 'unknown_alias');
});

test('scope checks honour base scopes, wildcards and full access', async () => {
  const { client } = testClient(() => ({}));
  const registry = await testRegistry(
    client,
    {
      alpha: credentialEntry({ envVar: 'KEY_ALPHA', scopes: ['faction'] }),
      bravo: credentialEntry({ envVar: 'KEY_BRAVO', scopes: ['*'] }),
      charlie: credentialEntry({ envVar: 'KEY_CHARLIE', scopes: [], accessLevel: 'Full Access' }),
      delta: credentialEntry({ envVar: 'KEY_DELTA', scopes: ['faction'] }),
    },
    env
  );

  assert.equal(registry.hasScope('alpha', 'faction.crimes'), true);
  assert.equal(registry.hasScope('alpha', 'user'), false);
  assert.equal(registry.hasScope('bravo', 'user'), true);
  assert.equal(registry.hasScope('charlie', 'torn'), true);
  assert.deepEqual(
    registry.scoped('faction').map((credential) => credential.alias),
    ['alpha', 'bravo', 'charlie']
  );
});

test('select prefers the requester, then shared keys', async () => {
  const { client } = testClient(() => ({}));
  const registry = await testRegistry(
    client,
    {
      alpha: credentialEntry({ envVar: 'KEY_ALPHA', owner: 'user-1' }),
      bravo: credentialEntry({ envVar: 'KEY_BRAVO', owner: 'shared' }),
      charlie: credentialEntry({ envVar: 'KEY_CHARLIE', owner: 'user-3' }),
    },
    env
  );

  assert.equal(registry.select('faction', 'user-3')?.alias, 'charlie');
  assert.equal(registry.select('faction', 'user-9')?.alias, 'bravo');
});

test('selectAny falls back to any scoped key', async () => {
  const { client } = testClient(() => ({}));
  const registry = await testRegistry(client, { alpha: credentialEntry({ envVar: 'KEY_ALPHA', owner: 'user-1' }) }, env);

  assert.equal(registry.select('faction', 'user-2'), null);
  assert.equal(registry.selectAny('faction', 'user-2')?.alias, 'alpha');
});

test('affiliations rank keys of the target faction first', async () => {
  const { client } = testClient((url) => {
    const secret = url.searchParams.get('key');
    if (url.pathname === '/v2/faction') {
      if (secret === env.KEY_ALPHA) return { basic: { id: 100 } };
      if (secret === env.KEY_BRAVO) return upstreamError(7);
      return { basic: { id: 300 } };
    }
    return { faction: { faction_id: 200 } };
  });
  const registry = await testRegistry(
    client,
    {
      alpha: credentialEntry({ envVar: 'KEY_ALPHA' }),
      bravo: credentialEntry({ envVar: 'KEY_BRAVO' }),
      charlie: credentialEntry({ envVar: 'KEY_CHARLIE' }),
    },
    env
  );

  const affiliations = await registry.buildAffiliations('faction');
  assert.deepEqual(Array.from(affiliations.entries()), [
    ['alpha', 100],
    ['bravo', 200],
    ['charlie', 300],
  ]);
  assert.deepEqual(
    registry.rankForFaction('faction', 200, affiliations).map((credential) => credential.alias),
    ['bravo', 'alpha', 'charlie']
  );
  assert.equal(registry.selectAffiliated('faction', 300, affiliations)?.alias, 'charlie');
});

test('list shows own and shared keys to non-administrators', async () => {
  const { client } = testClient(() => ({}));
  const registry = await testRegistry(
    client,
    {
      alpha: credentialEntry({ envVar: 'KEY_ALPHA', owner: 'user-1' }),
      bravo: credentialEntry({ envVar: 'KEY_BRAVO', owner: 'shared' }),
      charlie: credentialEntry({ envVar: 'KEY_CHARLIE', owner: 'user-3' }),
    },
    env
  );

  assert.deepEqual(
    registry.list('user-1').map((summary) => summary.alias),
    ['alpha', 'bravo']
  );
  assert.equal(registry.list().length, 3);
});
