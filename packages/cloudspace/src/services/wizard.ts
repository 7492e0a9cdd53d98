import { randomUUID } from 'crypto';
import pc from 'picocolors';
import {
  CNI_PLUGINS,
  DEFAULT_CNI,
  DEFAULT_DESIRED_NODES,
  DEFAULT_KUBERNETES_VERSION,
  KUBERNETES_VERSIONS,
  VALID_REGIONS,
} from '../constants.js';
import {
  CloudspaceError,
  OperationCancelled,
  errorMessage,
} from '../errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import {
  type Cancelled,
  type Prompter,
  CANCELLED,
  isCancelled,
} from '../utils/prompter.js';
import type { CloudspaceApi } from './api.js';
import {
  DEFAULT_MINIMUM_BID_PRICE,
  normalizeBidPrice,
  tryNormalizeBidPrice,
} from './pricing.js';
import type { CreateRequest, Region, ServerClass } from '../types.js';
import { isValidRegion } from '../validators/cloudspace.js';

export type WizardState =
  | { status: 'running'; step: number }
  | { status: 'cancelled' }
  | { status: 'failed'; error: unknown }
  | { status: 'completed'; request: CreateRequest };

export interface WizardDefaults {
  org?: string;
  region?: string;
  kubernetesVersion?: string;
  cni?: string;
}

export interface WizardOptions {
  defaults?: WizardDefaults;
  /** Polled between steps; once aborted no further step starts. */
  signal?: AbortSignal;
  logger?: Logger;
  newPoolName?: () => string;
  onTransition?: (state: WizardState, stepName?: string) => void;
}

type StepOutcome = 'next' | Cancelled;

interface WizardStep {
  name: string;
  run(): Promise<StepOutcome>;
}

type PoolType = 'spot' | 'ondemand';

/**
 * Collects a CreateRequest from an operator one step at a time. Steps never
 * go back; a step only repeats its own prompt when the answer is unusable.
 * Nothing is created remotely here.
 */
export class CloudspaceWizard {
  private state: WizardState = { status: 'running', step: 0 };
  private readonly request: CreateRequest;
  private readonly steps: WizardStep[];
  private readonly logger: Logger;
  private readonly newPoolName: () => string;

  constructor(
    private readonly api: CloudspaceApi,
    private readonly prompter: Prompter,
    private readonly options: WizardOptions = {},
  ) {
    const defaults = options.defaults ?? {};
    this.logger = options.logger ?? silentLogger;
    this.newPoolName = options.newPoolName ?? randomUUID;
    this.request = {
      name: '',
      organization: defaults.org ?? '',
      region: defaults.region ?? '',
      kubernetesVersion: defaults.kubernetesVersion ?? DEFAULT_KUBERNETES_VERSION,
      cni: defaults.cni ?? DEFAULT_CNI,
      preemptionWebhookURL: '',
      spotPools: [],
      onDemandPools: [],
    };
    this.steps = [
      { name: 'select-region', run: () => this.selectRegion() },
      { name: 'enter-name', run: () => this.enterName() },
      { name: 'select-kubernetes-version', run: () => this.selectKubernetesVersion() },
      { name: 'select-cni', run: () => this.selectCni() },
      { name: 'add-node-pools', run: () => this.addNodePools() },
      { name: 'summary', run: () => this.confirmSummary() },
    ];
  }

  get currentState(): WizardState {
    return this.state;
  }

  async run(): Promise<CreateRequest> {
    for (const [index, step] of this.steps.entries()) {
      this.transition({ status: 'running', step: index }, step.name);

      if (this.options.signal?.aborted) {
        this.transition({ status: 'cancelled' }, step.name);
        break;
      }

      let outcome: StepOutcome;
      try {
        outcome = await step.run();
      } catch (error) {
        this.transition({ status: 'failed', error }, step.name);
        break;
      }

      if (isCancelled(outcome)) {
        this.transition({ status: 'cancelled' }, step.name);
        break;
      }
    }

    const state = this.state;
    switch (state.status) {
      case 'running': {
        const request = this.snapshot();
        this.transition({ status: 'completed', request });
        return request;
      }
      case 'completed':
        return state.request;
      case 'cancelled':
        throw new OperationCancelled('cloudspace creation cancelled');
      case 'failed':
        throw new OperationCancelled(
          `cloudspace creation aborted: ${errorMessage(state.error)}`,
          { cause: state.error },
        );
    }
  }

  private transition(state: WizardState, stepName?: string): void {
    this.state = state;
    this.options.onTransition?.(state, stepName);
  }

  private snapshot(): CreateRequest {
    return {
      ...this.request,
      spotPools: this.request.spotPools.map((pool) => ({ ...pool })),
      onDemandPools: this.request.onDemandPools.map((pool) => ({ ...pool })),
    };
  }

  private async selectRegion(): Promise<StepOutcome> {
    this.logger.info('Fetching available regions...');

    let regions: Region[] = [];
    try {
      regions = await this.api.listRegions();
    } catch (error) {
      this.logger.warn(`Could not list regions: ${errorMessage(error)}`);
    }

    const valid = regions.filter((r) => isValidRegion(r.name));
    if (valid.length === 0) {
      return this.enterRegionManually();
    }

    const sorted = [...valid].sort((a, b) => a.name.localeCompare(b.name));
    const initial = sorted.some((r) => r.name === this.request.region)
      ? this.request.region
      : undefined;

    const region = await this.prompter.select(
      'Select a region:',
      sorted.map((r) => ({ value: r.name, label: r.name, hint: r.description })),
      initial,
    );
    if (isCancelled(region)) {
      return CANCELLED;
    }
    this.request.region = region;
    return 'next';
  }

  private async enterRegionManually(): Promise<StepOutcome> {
    for (;;) {
      const region = await this.prompter.text('Enter region (e.g. us-central-ord-1):', {
        placeholder: this.request.region || undefined,
        defaultValue: this.request.region || undefined,
      });
      if (isCancelled(region)) {
        return CANCELLED;
      }
      const trimmed = region.trim();
      if (trimmed.length === 0) {
        this.logger.warn('Region cannot be empty. Please enter a valid region.');
      } else if (!isValidRegion(trimmed)) {
        this.logger.warn(
          `Region ${trimmed} is not valid. Available regions: ${VALID_REGIONS.join(', ')}`,
        );
      } else {
        this.request.region = trimmed;
        return 'next';
      }
    }
  }

  private async enterName(): Promise<StepOutcome> {
    for (;;) {
      const name = await this.prompter.text('Enter a name for your cloudspace:');
      if (isCancelled(name)) {
        return CANCELLED;
      }
      if (name.trim().length > 0) {
        this.request.name = name.trim();
        return 'next';
      }
      this.logger.warn('Name cannot be empty. Please enter a valid name.');
    }
  }

  private async selectKubernetesVersion(): Promise<StepOutcome> {
    const current = this.request.kubernetesVersion;
    const version = await this.prompter.select(
      'Select Kubernetes version:',
      withDefaultFirst(KUBERNETES_VERSIONS, current).map((v) => ({ value: v })),
      current,
    );
    if (isCancelled(version)) {
      return CANCELLED;
    }
    this.request.kubernetesVersion = version;
    return 'next';
  }

  private async selectCni(): Promise<StepOutcome> {
    const current = this.request.cni;
    const cni = await this.prompter.select(
      'Select CNI plugin:',
      withDefaultFirst(CNI_PLUGINS, current).map((c) => ({ value: c })),
      current,
    );
    if (isCancelled(cni)) {
      return CANCELLED;
    }
    this.request.cni = cni;
    return 'next';
  }

  private async addNodePools(): Promise<StepOutcome> {
    for (;;) {
      const poolType = await this.prompter.select<PoolType>(
        'Add a node pool:',
        [
          { value: 'spot', label: 'Spot', hint: 'bid for spare capacity' },
          { value: 'ondemand', label: 'On-Demand', hint: 'fixed hourly price' },
        ],
        'spot',
      );
      if (isCancelled(poolType)) {
        return CANCELLED;
      }

      const added =
        poolType === 'spot' ? await this.addSpotPool() : await this.addOnDemandPool();
      if (isCancelled(added)) {
        return CANCELLED;
      }

      const another = await this.prompter.confirm('Add another node pool?', false);
      if (isCancelled(another)) {
        return CANCELLED;
      }
      if (!another) {
        return 'next';
      }
    }
  }

  private async addSpotPool(): Promise<StepOutcome> {
    const serverClasses = await this.api.listServerClasses(this.request.region);
    const serverClass = await this.selectServerClass(serverClasses, 'spot');
    if (isCancelled(serverClass)) {
      return CANCELLED;
    }

    const minimumBid = await this.minimumBidPrice(serverClass);
    this.prompter.note(
      `Minimum bid for ${serverClass.name}: $${minimumBid}/hour`,
      'Spot pricing',
    );

    const desired = await this.promptDesired('spot');
    if (isCancelled(desired)) {
      return CANCELLED;
    }

    const bidPrice = await this.promptBidPrice(minimumBid);
    if (isCancelled(bidPrice)) {
      return CANCELLED;
    }

    this.request.spotPools.push({
      name: this.newPoolName(),
      serverClass: serverClass.name,
      desired,
      bidPrice,
    });
    return 'next';
  }

  private async addOnDemandPool(): Promise<StepOutcome> {
    const serverClasses = await this.api.listServerClasses(this.request.region);
    const serverClass = await this.selectServerClass(serverClasses, 'ondemand');
    if (isCancelled(serverClass)) {
      return CANCELLED;
    }

    const desired = await this.promptDesired('on-demand');
    if (isCancelled(desired)) {
      return CANCELLED;
    }

    this.request.onDemandPools.push({
      name: this.newPoolName(),
      serverClass: serverClass.name,
      desired,
    });
    return 'next';
  }

  private async selectServerClass(
    serverClasses: ServerClass[],
    poolType: PoolType,
  ): Promise<ServerClass | Cancelled> {
    if (serverClasses.length === 0) {
      throw new CloudspaceError(
        `no server classes available for region ${this.request.region}`,
      );
    }

    const selected = await this.prompter.select(
      'Select a server class:',
      serverClasses.map((sc) => ({
        value: sc.name,
        label: sc.name,
        hint: describeServerClass(sc, poolType),
      })),
    );
    if (isCancelled(selected)) {
      return CANCELLED;
    }
    return serverClasses.find((sc) => sc.name === selected) ?? CANCELLED;
  }

  /**
   * Asks the control plane first, then falls back to what the listing said,
   * then to the fixed default.
   */
  private async minimumBidPrice(serverClass: ServerClass): Promise<string> {
    try {
      return normalizeBidPrice(await this.api.getMinimumBidPrice(serverClass.name));
    } catch (error) {
      this.logger.warn(
        `Could not fetch minimum bid for ${serverClass.name}: ${errorMessage(error)}`,
      );
    }

    const candidates = [
      serverClass.minBidPricePerHour,
      serverClass.currentMarketPricePerHour,
    ]
      .map((price) => (price ? tryNormalizeBidPrice(price) : undefined))
      .flatMap((result) => (result?.ok ? [result.value] : []));

    if (candidates.length === 0) {
      return DEFAULT_MINIMUM_BID_PRICE;
    }
    return candidates.reduce((max, price) =>
      Number(price) > Number(max) ? price : max,
    );
  }

  private async promptDesired(label: string): Promise<number | Cancelled> {
    for (;;) {
      const value = await this.prompter.text(
        `Enter number of ${label} nodes (default: ${DEFAULT_DESIRED_NODES}):`,
        {
          placeholder: String(DEFAULT_DESIRED_NODES),
          defaultValue: String(DEFAULT_DESIRED_NODES),
        },
      );
      if (isCancelled(value)) {
        return CANCELLED;
      }
      const trimmed = value.trim() || String(DEFAULT_DESIRED_NODES);
      const desired = /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
      if (Number.isInteger(desired) && desired >= 1) {
        return desired;
      }
      this.logger.warn('Please enter a valid number >= 1.');
    }
  }

  private async promptBidPrice(minimumBid: string): Promise<string | Cancelled> {
    for (;;) {
      const value = await this.prompter.text(
        `Enter your maximum bid price (minimum: $${minimumBid}):`,
        { placeholder: minimumBid, defaultValue: minimumBid },
      );
      if (isCancelled(value)) {
        return CANCELLED;
      }
      const price = tryNormalizeBidPrice(value.trim() || minimumBid);
      if (price.ok) {
        return price.value;
      }
      this.logger.warn(`Invalid bid price: ${price.error.message}`);
    }
  }

  private async confirmSummary(): Promise<StepOutcome> {
    this.prompter.note(formatSummary(this.request), 'Cloudspace Configuration');

    const confirmed = await this.prompter.confirm(
      'Create cloudspace with the above configuration?',
      true,
    );
    if (isCancelled(confirmed) || !confirmed) {
      return CANCELLED;
    }
    return 'next';
  }
}

export function withDefaultFirst(choices: string[], defaultValue: string): string[] {
  if (!defaultValue || choices.includes(defaultValue)) {
    return [...choices];
  }
  return [defaultValue, ...choices];
}

function describeServerClass(sc: ServerClass, poolType: PoolType): string {
  const resources = `CPU: ${sc.cpu ?? '?'}, Memory: ${sc.memory ?? '?'}`;
  if (poolType === 'ondemand') {
    return `${resources}, Price: ${sc.onDemandPricePerHour ?? 'n/a'}`;
  }
  return `${resources}, Market: ${sc.currentMarketPricePerHour ?? 'n/a'}, Min bid: ${sc.minBidPricePerHour ?? 'n/a'}`;
}

export function formatSummary(request: CreateRequest): string {
  const lines = [
    `Name:               ${pc.cyan(request.name)}`,
    `Organization:       ${pc.cyan(request.organization || '(from configuration)')}`,
    `Region:             ${pc.cyan(request.region)}`,
    `Kubernetes Version: ${pc.cyan(request.kubernetesVersion)}`,
    `CNI:                ${pc.cyan(request.cni)}`,
  ];

  if (request.spotPools.length > 0) {
    lines.push('', 'Spot Node Pools:');
    for (const pool of request.spotPools) {
      lines.push(
        `  • ${pc.cyan(pool.name)}`,
        `    Server Class:  ${pool.serverClass}`,
        `    Desired Nodes: ${pool.desired}`,
        `    Bid Price:     $${pool.bidPrice}`,
      );
    }
  }

  if (request.onDemandPools.length > 0) {
    lines.push('', 'On-Demand Node Pools:');
    for (const pool of request.onDemandPools) {
      lines.push(
        `  • ${pc.cyan(pool.name)}`,
        `    Server Class:  ${pool.serverClass}`,
        `    Desired Nodes: ${pool.desired}`,
      );
    }
  }

  return lines.join('\n');
}
