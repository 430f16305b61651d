import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import {
  CacheError,
  createMemoryCacheStore,
  createRedisStoreFromCommands,
  type CacheStorePort,
} from '@/infra/cache/index.js';
import { makeAccountResolver } from '@/modules/accounts/index.js';
import {
  createKeySchema,
  makeSecurityGroupProvider,
  makeSecurityGroupRepo,
  SECURITY_GROUPS_NAMESPACE,
  type ReconstructionFailureReporter,
  type SecurityGroupProvider,
} from '@/modules/security-groups/index.js';

import {
  makeRawPermission,
  makeSecurityGroupEntry,
  makeTestLogger,
} from '../../fixtures/builders.js';
import {
  makeFailingCacheStore,
  makeFakeRedisCommands,
  type FakeRedisCommands,
} from '../../fixtures/fakes.js';

import type { CacheEntry } from '@/infra/cache/index.js';

const ACCOUNTS = [
  { name: 'prod', accountId: '111111111111' },
  { name: 'test', accountId: '222222222222' },
];

const makeProvider = (
  store: CacheStorePort,
  onReconstructionFailure?: ReconstructionFailureReporter
): SecurityGroupProvider => {
  const keys = createKeySchema();
  return makeSecurityGroupProvider({
    repo: makeSecurityGroupRepo({ store, keys }),
    keys,
    accountResolver: makeAccountResolver(ACCOUNTS),
    logger: makeTestLogger(),
    onReconstructionFailure,
  });
};

const seed = async (store: CacheStorePort): Promise<void> => {
  const entries: CacheEntry[] = [];
  for (const account of ['prod', 'test']) {
    for (const region of ['us-east-1', 'us-west-1']) {
      entries.push(makeSecurityGroupEntry({ account, region, name: 'a', id: 'sg-a' }));
      entries.push(makeSecurityGroupEntry({ account, region, name: 'b', id: 'sg-b' }));
    }
  }
  await store.mergeAll(SECURITY_GROUPS_NAMESPACE, entries);
};

describe('SecurityGroupProvider', () => {
  let store: CacheStorePort;
  let provider: SecurityGroupProvider;
  let onReconstructionFailure: Mock<ReconstructionFailureReporter>;

  beforeEach(async () => {
    store = createMemoryCacheStore();
    await seed(store);
    onReconstructionFailure = vi.fn<ReconstructionFailureReporter>();
    provider = makeProvider(store, onReconstructionFailure);
  });

  describe('listing', () => {
    it('returns every group in a stable order', async () => {
      const groups = (await provider.getAll(false))._unsafeUnwrap();

      expect(groups.map((group) => `${group.accountName}/${group.region}/${group.name}`)).toEqual([
        'prod/us-east-1/a',
        'prod/us-east-1/b',
        'prod/us-west-1/a',
        'prod/us-west-1/b',
        'test/us-east-1/a',
        'test/us-east-1/b',
        'test/us-west-1/a',
        'test/us-west-1/b',
      ]);
    });

    it('filters by region', async () => {
      const groups = (await provider.getAllByRegion(false, 'us-west-1'))._unsafeUnwrap();

      expect(groups).toHaveLength(4);
      expect(groups.every((group) => group.region === 'us-west-1')).toBe(true);
    });

    it('filters by account', async () => {
      const groups = (await provider.getAllByAccount(false, 'prod'))._unsafeUnwrap();

      expect(groups).toHaveLength(4);
      expect(groups.every((group) => group.accountName === 'prod')).toBe(true);
    });

    it('filters by account and region', async () => {
      const result = await provider.getAllByAccountAndRegion(false, 'prod', 'us-west-1');
      const groups = result._unsafeUnwrap();

      expect(groups.map((group) => `${group.accountName}/${group.region}/${group.id}`)).toEqual([
        'prod/us-west-1/sg-a',
        'prod/us-west-1/sg-b',
      ]);
    });

    it('filters by account and name', async () => {
      const groups = (await provider.getAllByAccountAndName(false, 'prod', 'a'))._unsafeUnwrap();

      expect(groups.map((group) => `${group.region}/${group.id}`)).toEqual([
        'us-east-1/sg-a',
        'us-west-1/sg-a',
      ]);
    });

    it('returns VPC-scoped and unscoped groups sharing a name', async () => {
      await store.merge(
        SECURITY_GROUPS_NAMESPACE,
        makeSecurityGroupEntry({
          account: 'prod',
          region: 'us-east-1',
          name: 'a',
          id: 'sg-c',
          vpcId: 'vpc-1',
        })
      );

      const groups = (await provider.getAllByAccountAndName(false, 'prod', 'a'))._unsafeUnwrap();

      expect(groups.map((group) => group.vpcId ?? '-')).toEqual(['-', 'vpc-1', '-']);
    });

    it('skips rule reconstruction when rules are not requested', async () => {
      await store.merge(
        SECURITY_GROUPS_NAMESPACE,
        makeSecurityGroupEntry({
          account: 'prod',
          region: 'eu-west-1',
          name: 'odd',
          id: 'sg-odd',
          attributes: { ipPermissions: 'not-a-list' },
        })
      );

      const withoutRules = (await provider.getAllByRegion(false, 'eu-west-1'))._unsafeUnwrap();
      const withRules = (await provider.getAllByRegion(true, 'eu-west-1'))._unsafeUnwrap();

      expect(withoutRules.map((group) => group.id)).toEqual(['sg-odd']);
      expect(withoutRules[0]?.inboundRules).toEqual([]);
      expect(withRules).toEqual([]);
      expect(onReconstructionFailure).toHaveBeenCalledTimes(1);
    });

    it('skips and reports malformed entries', async () => {
      const brokenKey = createKeySchema().encode(
        'security-group',
        'prod',
        'us-east-1',
        'broken',
        'sg-x'
      );
      await store.merge(SECURITY_GROUPS_NAMESPACE, {
        key: brokenKey,
        attributes: { description: 42 },
        relationships: {},
      });

      const result = await provider.getAllByAccountAndRegion(true, 'prod', 'us-east-1');
      const groups = result._unsafeUnwrap();

      expect(groups.map((group) => group.name)).toEqual(['a', 'b']);
      expect(onReconstructionFailure).toHaveBeenCalledWith({
        key: brokenKey,
        error: expect.objectContaining({ type: 'MalformedEntry', key: brokenKey }),
      });
    });

    it('reports keys that do not decode', async () => {
      await store.merge(SECURITY_GROUPS_NAMESPACE, {
        key: 'garbage',
        attributes: {},
        relationships: {},
      });

      const groups = (await provider.getAll(false))._unsafeUnwrap();

      expect(groups).toHaveLength(8);
      expect(onReconstructionFailure).toHaveBeenCalledWith({
        key: 'garbage',
        error: expect.objectContaining({ type: 'InvalidKey' }),
      });
    });
  });

  describe('get', () => {
    it('returns the matching group with its account id', async () => {
      const group = (await provider.get('prod', 'us-east-1', 'a'))._unsafeUnwrap();

      expect(group).toEqual({
        id: 'sg-a',
        name: 'a',
        description: 'a description',
        accountName: 'prod',
        accountId: '111111111111',
        region: 'us-east-1',
        inboundRules: [],
        tags: [],
      });
    });

    it('looks groups up by id', async () => {
      const group = (await provider.getById('test', 'us-west-1', 'sg-b'))._unsafeUnwrap();

      expect(group?.name).toBe('b');
      expect(group?.accountId).toBe('222222222222');
    });

    it('returns null on a miss', async () => {
      expect((await provider.get('prod', 'us-east-1', 'missing'))._unsafeUnwrap()).toBeNull();
      expect((await provider.getById('prod', 'eu-west-1', 'sg-a'))._unsafeUnwrap()).toBeNull();
    });

    it('returns null and reports a malformed match', async () => {
      await store.merge(
        SECURITY_GROUPS_NAMESPACE,
        makeSecurityGroupEntry({
          account: 'prod',
          region: 'us-east-1',
          name: 'broken',
          id: 'sg-x',
          attributes: { tags: 'none' },
        })
      );

      const result = await provider.get('prod', 'us-east-1', 'broken');

      expect(result._unsafeUnwrap()).toBeNull();
      expect(onReconstructionFailure).toHaveBeenCalledTimes(1);
    });

    it('reconstructs rules with a single cache read for same-account references', async () => {
      await store.merge(
        SECURITY_GROUPS_NAMESPACE,
        makeSecurityGroupEntry({
          account: 'prod',
          region: 'us-east-1',
          name: 'web',
          id: 'sg-web',
          permissions: [
            makeRawPermission({
              fromPort: 443,
              toPort: 443,
              ipv4Ranges: [{ cidrIp: '10.0.0.0/8' }],
              userIdGroupPairs: [{ userId: '111111111111', groupId: 'sg-a', groupName: 'a' }],
            }),
          ],
        })
      );
      const filter = vi.spyOn(store, 'filter');
      const get = vi.spyOn(store, 'get');

      const group = (await provider.get('prod', 'us-east-1', 'web'))._unsafeUnwrap();

      expect(filter).toHaveBeenCalledTimes(1);
      expect(get).not.toHaveBeenCalled();
      expect(group?.inboundRules).toEqual([
        {
          type: 'range',
          protocol: 'tcp',
          portRanges: [{ startPort: 443, endPort: 443 }],
          range: { ip: '10.0.0.0', cidr: '/8' },
        },
        {
          type: 'reference',
          protocol: 'tcp',
          portRanges: [{ startPort: 443, endPort: 443 }],
          referencedGroup: {
            id: 'sg-a',
            name: 'a',
            accountName: 'prod',
            accountId: '111111111111',
            region: 'us-east-1',
          },
        },
      ]);
    });

    describe('VPC selection', () => {
      const shared = (id: string, vpcId?: string) =>
        makeSecurityGroupEntry({
          account: 'prod',
          region: 'us-east-1',
          name: 'shared',
          id,
          ...(vpcId !== undefined && { vpcId }),
        });

      beforeEach(async () => {
        await store.mergeAll(SECURITY_GROUPS_NAMESPACE, [
          shared('sg-s1', 'vpc-1'),
          shared('sg-s2', 'vpc-2'),
        ]);
      });

      it('reports several VPC-scoped matches as ambiguous', async () => {
        const result = await provider.get('prod', 'us-east-1', 'shared');

        expect(result._unsafeUnwrapErr()).toMatchObject({
          type: 'AmbiguousSecurityGroup',
          candidates: [
            'aws:security-group:prod:us-east-1:shared:sg-s1:vpc-1',
            'aws:security-group:prod:us-east-1:shared:sg-s2:vpc-2',
          ],
        });
      });

      it('matches an explicit vpcId exactly', async () => {
        const group = (await provider.get('prod', 'us-east-1', 'shared', 'vpc-2'))._unsafeUnwrap();

        expect(group?.id).toBe('sg-s2');
        expect(group?.vpcId).toBe('vpc-2');
        expect((await provider.get('prod', 'us-east-1', 'shared', 'vpc-3'))._unsafeUnwrap()).toBeNull();
      });

      it('prefers the group outside any VPC', async () => {
        await store.merge(SECURITY_GROUPS_NAMESPACE, shared('sg-s0'));

        const group = (await provider.get('prod', 'us-east-1', 'shared'))._unsafeUnwrap();

        expect(group?.id).toBe('sg-s0');
        expect(group?.vpcId).toBeUndefined();
      });

      it('returns the only match by id', async () => {
        const group = (await provider.getById('prod', 'us-east-1', 'sg-s1'))._unsafeUnwrap();

        expect(group?.vpcId).toBe('vpc-1');
      });
    });
  });

  describe('shared reference lookups', () => {
    it('reads a group referenced by many listed groups once', async () => {
      const entries: CacheEntry[] = [];
      for (let index = 0; index < 10; index++) {
        entries.push(
          makeSecurityGroupEntry({
            account: 'prod',
            region: 'eu-west-1',
            name: `web-${String(index)}`,
            id: `sg-web-${String(index)}`,
            permissions: [
              makeRawPermission({ userIdGroupPairs: [{ userId: '222222222222', groupId: 'sg-a' }] }),
            ],
          })
        );
      }
      entries.push(makeSecurityGroupEntry({ account: 'test', region: 'eu-west-1', name: 'a', id: 'sg-a' }));
      await store.mergeAll(SECURITY_GROUPS_NAMESPACE, entries);
      const filter = vi.spyOn(store, 'filter');

      const groups = (await provider.getAllByRegion(true, 'eu-west-1'))._unsafeUnwrap();

      expect(filter).toHaveBeenCalledTimes(2);
      expect(groups.map((group) => group.name)).toEqual([
        'web-0',
        'web-1',
        'web-2',
        'web-3',
        'web-4',
        'web-5',
        'web-6',
        'web-7',
        'web-8',
        'web-9',
        'a',
      ]);
      expect(groups[9]?.inboundRules).toEqual([
        {
          type: 'reference',
          protocol: 'tcp',
          portRanges: [{ startPort: 80, endPort: 80 }],
          referencedGroup: {
            id: 'sg-a',
            name: 'a',
            accountName: 'test',
            accountId: '222222222222',
            region: 'eu-west-1',
          },
        },
      ]);
    });
  });

  describe('over the Redis store', () => {
    const keys = createKeySchema();
    const corruptKey = keys.encode('security-group', 'prod', 'us-east-1', 'b', 'sg-b');
    let commands: FakeRedisCommands;
    let redisStore: CacheStorePort;
    let redisProvider: SecurityGroupProvider;

    beforeEach(async () => {
      commands = makeFakeRedisCommands();
      redisStore = createRedisStoreFromCommands(commands);
      await seed(redisStore);
      commands.values.set(`inventory:${SECURITY_GROUPS_NAMESPACE}:entry:${corruptKey}`, '{not json');
      redisProvider = makeProvider(redisStore, onReconstructionFailure);
    });

    it('lists the remaining groups when one value is corrupted', async () => {
      const all = (await redisProvider.getAll(false))._unsafeUnwrap();
      const prod = (await redisProvider.getAllByAccount(false, 'prod'))._unsafeUnwrap();

      expect(all).toHaveLength(7);
      expect(prod.map((group) => `${group.region}/${group.name}`)).toEqual([
        'us-east-1/a',
        'us-west-1/a',
        'us-west-1/b',
      ]);
      expect(onReconstructionFailure).toHaveBeenCalledTimes(2);
      expect(onReconstructionFailure).toHaveBeenCalledWith({
        key: corruptKey,
        error: expect.objectContaining({ type: 'MalformedEntry', key: corruptKey }),
      });
    });

    it('leaves corrupted values out of listings that do not cover them', async () => {
      const groups = (await redisProvider.getAllByAccount(false, 'test'))._unsafeUnwrap();

      expect(groups).toHaveLength(4);
      expect(onReconstructionFailure).not.toHaveBeenCalled();
    });

    it('returns null and reports a corrupted match', async () => {
      const group = (await redisProvider.get('prod', 'us-east-1', 'b'))._unsafeUnwrap();

      expect(group).toBeNull();
      expect(onReconstructionFailure).toHaveBeenCalledTimes(1);
    });

    it('resolves references to a group whose value is corrupted', async () => {
      await redisStore.merge(
        SECURITY_GROUPS_NAMESPACE,
        makeSecurityGroupEntry({
          account: 'test',
          region: 'us-east-1',
          name: 'web',
          id: 'sg-web',
          permissions: [
            makeRawPermission({ userIdGroupPairs: [{ userId: '111111111111', groupId: 'sg-b' }] }),
          ],
        })
      );

      const group = (await redisProvider.get('test', 'us-east-1', 'web'))._unsafeUnwrap();

      expect(group?.inboundRules).toEqual([
        {
          type: 'reference',
          protocol: 'tcp',
          portRanges: [{ startPort: 80, endPort: 80 }],
          referencedGroup: {
            id: 'sg-b',
            name: 'b',
            accountName: 'prod',
            accountId: '111111111111',
            region: 'us-east-1',
          },
        },
      ]);
    });
  });

  describe('cache failures', () => {
    it('propagates store errors', async () => {
      const failing = makeProvider(makeFailingCacheStore(CacheError.timeout('Command timed out')));

      expect((await failing.getAll(true))._unsafeUnwrapErr().type).toBe('TimeoutError');
      expect((await failing.getAllByRegion(false, 'us-east-1'))._unsafeUnwrapErr().type).toBe(
        'TimeoutError'
      );
      expect((await failing.get('prod', 'us-east-1', 'a'))._unsafeUnwrapErr().type).toBe(
        'TimeoutError'
      );
    });
  });
});
