export const VALID_REGIONS = [
  'us-central-ord-1',
  'hkg-hkg-1',
  'aus-syd-1',
  'uk-lon-1',
  'us-east-iad-1',
  'us-central-dfw-1',
  'us-central-dfw-2',
  'us-west-sjc-1',
] as const;

export type RegionCode = (typeof VALID_REGIONS)[number];

export const DEFAULT_KUBERNETES_VERSION = '1.31.1';
export const KUBERNETES_VERSIONS = ['1.31.1', '1.30.10', '1.29.6'];

export const DEFAULT_CNI = 'calico';
export const CNI_PLUGINS = ['calico', 'cilium', 'bring your own CNI'];

export const DEFAULT_SERVER_CLASS = 'gp.vs1.medium-ord';
export const DEFAULT_DESIRED_NODES = 1;

export const DEFAULT_BASE_URL = 'https://spot.rackspace.com';
