export interface SpotPoolSpec {
  name: string;
  serverClass: string;
  desired: number;
  bidPrice: string;
}

export interface OnDemandPoolSpec {
  name: string;
  serverClass: string;
  desired: number;
}

export interface CreateRequest {
  name: string;
  organization: string;
  region: string;
  kubernetesVersion: string;
  cni: string;
  preemptionWebhookURL: string;
  spotPools: SpotPoolSpec[];
  onDemandPools: OnDemandPoolSpec[];
}

export interface Region {
  name: string;
  description?: string;
}

export interface ServerClass {
  name: string;
  region?: string;
  cpu?: string;
  memory?: string;
  currentMarketPricePerHour?: string;
  minBidPricePerHour?: string;
  onDemandPricePerHour?: string;
}

export interface CloudspaceSpec {
  name: string;
  org: string;
  region: string;
  kubernetesVersion: string;
  cni: string;
  preemptionWebhookURL?: string;
}

export interface Cloudspace extends CloudspaceSpec {
  status?: string;
}

export interface SpotNodePool {
  name: string;
  org: string;
  cloudspace: string;
  serverClass: string;
  desired: number;
  bidPrice: string;
}

export interface OnDemandNodePool {
  name: string;
  org: string;
  cloudspace: string;
  serverClass: string;
  desired: number;
}

export interface Organization {
  name: string;
  displayName?: string;
}
