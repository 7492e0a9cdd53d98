import { describe, it, expect } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  ConfigError,
  ConflictingSource,
  RemoteNotFound,
  ValidationError,
} from '../errors.js';
import { FakeCloudspaceApi } from '../testing/fake-api.js';
import type { Prompter } from '../utils/prompter.js';
import type { CreateFlags } from './acquire.js';
import {
  createCloudspace,
  listCloudspaces,
  resolveOrg,
  saveCloudspaceConfig,
} from './cloudspace.js';

const noPrompts: Prompter = {
  select: () => Promise.reject(new Error('unexpected prompt')),
  text: () => Promise.reject(new Error('unexpected prompt')),
  confirm: () => Promise.reject(new Error('unexpected prompt')),
  note: () => {},
};

function flags(overrides: Partial<CreateFlags> = {}): CreateFlags {
  return { spotNodepool: [], ondemandNodepool: [], ...overrides };
}

describe('createCloudspace', () => {
  it('rejects an unknown region before calling the control plane', async () => {
    const api = new FakeCloudspaceApi();

    const error: unknown = await createCloudspace(
      {
        flags: flags({
          region: 'mars-1',
          name: 'x',
          spotNodepool: ['desired=1,serverclass=gp.vs1.medium-ord,bidprice=0.08'],
        }),
        explicit: new Set(['region', 'name', 'spotNodepool']),
        defaults: { org: 'acme' },
      },
      { api, prompter: noPrompts },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ field: 'region' });
    expect(api.calls).toEqual([]);
  });

  it('requires a pool whatever the source', async () => {
    const api = new FakeCloudspaceApi();

    await expect(
      createCloudspace(
        {
          flags: flags({ region: 'uk-lon-1', name: 'x', org: 'acme' }),
          explicit: new Set(['region', 'name', 'org']),
        },
        { api, prompter: noPrompts },
      ),
    ).rejects.toMatchObject({ field: 'pools' });
    expect(api.calls).toEqual([]);
  });

  it('requires a pool when the request comes from a file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cloudspace-create-'));
    const file = path.join(dir, 'cs.yaml');
    await fs.writeFile(
      file,
      [
        'cloudspace:',
        '  name: demo',
        '  org: acme',
        '  region: uk-lon-1',
        'spotnodepools: []',
        'ondemandnodepools: []',
        '',
      ].join('\n'),
    );
    const api = new FakeCloudspaceApi();

    try {
      await expect(
        createCloudspace(
          { flags: flags({ config: file }), explicit: new Set(['config']) },
          { api, prompter: noPrompts },
        ),
      ).rejects.toMatchObject({ field: 'pools' });
      expect(api.calls).toEqual([]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('refuses a file combined with flags', async () => {
    const api = new FakeCloudspaceApi();

    await expect(
      createCloudspace(
        {
          flags: flags({ config: 'cs.yaml', region: 'uk-lon-1' }),
          explicit: new Set(['config', 'region']),
        },
        { api, prompter: noPrompts },
      ),
    ).rejects.toBeInstanceOf(ConflictingSource);
    expect(api.calls).toEqual([]);
  });

  it('provisions a request built from flags', async () => {
    const api = new FakeCloudspaceApi();

    const { request, cloudspace } = await createCloudspace(
      {
        flags: flags({
          name: 'demo',
          region: 'us-central-dfw-1',
          spotNodepool: ['name=spot-a,serverclass=gp.vs1.medium-dfw,bidprice=0.08'],
        }),
        explicit: new Set(['name', 'region', 'spotNodepool']),
        defaults: { org: 'acme' },
      },
      { api, prompter: noPrompts },
    );

    expect(request.kubernetesVersion).toBe('1.31.1');
    expect(cloudspace).toMatchObject({ name: 'demo', org: 'acme', region: 'us-central-dfw-1' });
    expect(api.spotPools.get('acme/spot-a')?.bidPrice).toBe('0.080');
    expect(api.calls).toEqual([
      'createCloudspace:demo',
      'createSpotNodePool:spot-a',
      'getCloudspace:demo',
    ]);
  });
});

describe('resolveOrg', () => {
  it('prefers the flag over the configuration', () => {
    expect(resolveOrg('flag-org', { org: 'config-org' })).toBe('flag-org');
    expect(resolveOrg(undefined, { org: 'config-org' })).toBe('config-org');
  });

  it('fails without an organization', () => {
    expect(() => resolveOrg('', {})).toThrow(ConfigError);
  });
});

describe('listCloudspaces', () => {
  it('returns the organization cloudspaces sorted by name', async () => {
    const api = new FakeCloudspaceApi();
    for (const name of ['zeta', 'alpha']) {
      await api.createCloudspace({
        name,
        org: 'acme',
        region: 'uk-lon-1',
        kubernetesVersion: '1.31.1',
        cni: 'calico',
      });
    }

    const items = await listCloudspaces(api, 'acme');

    expect(items.map((cs) => cs.name)).toEqual(['alpha', 'zeta']);
  });
});

describe('saveCloudspaceConfig', () => {
  it('writes the kubeconfig named after the cloudspace', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cloudspace-kube-'));
    const api = new FakeCloudspaceApi();
    api.kubeconfigs.set('acme/demo', 'apiVersion: v1\nkind: Config\n');

    try {
      const target = path.join(dir, 'nested');
      const written = await saveCloudspaceConfig(api, 'acme', 'demo', target);

      expect(written).toBe(path.join(target, 'demo.yaml'));
      await expect(fs.readFile(written, 'utf8')).resolves.toBe(
        'apiVersion: v1\nkind: Config\n',
      );
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('writes nothing when the cloudspace has no kubeconfig', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cloudspace-kube-'));
    const api = new FakeCloudspaceApi();

    try {
      await expect(saveCloudspaceConfig(api, 'acme', 'demo', dir)).rejects.toBeInstanceOf(
        RemoteNotFound,
      );
      await expect(fs.readdir(dir)).resolves.toEqual([]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
