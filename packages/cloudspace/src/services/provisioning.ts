import {
  type ResourceKind,
  type RollbackWarning,
  OperationCancelled,
  ProvisioningError,
  describeKind,
  errorMessage,
} from '../errors.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import type { CloudspaceApi } from './api.js';
import { normalizeBidPrice } from './pricing.js';
import type { Cloudspace, CreateRequest } from '../types.js';

export interface LedgerEntry {
  resourceKind: ResourceKind;
  resourceName: string;
}

export interface ProvisioningOptions {
  /** Checked before every create call; an in-flight call is never aborted. */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Creates a cloudspace and its node pools in request order and undoes the
 * created resources, newest first, if any step fails or the signal fires.
 */
export class ProvisioningSaga {
  private readonly entries: LedgerEntry[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly api: CloudspaceApi,
    private readonly options: ProvisioningOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  get ledger(): readonly LedgerEntry[] {
    return [...this.entries];
  }

  async run(request: CreateRequest): Promise<Cloudspace> {
    const org = request.organization;

    this.checkCancelled();
    try {
      await this.api.createCloudspace({
        name: request.name,
        org,
        region: request.region,
        kubernetesVersion: request.kubernetesVersion,
        cni: request.cni,
        preemptionWebhookURL: request.preemptionWebhookURL || undefined,
      });
    } catch (error) {
      throw new ProvisioningError('cloudspace', request.name, error);
    }
    this.record('cloudspace', request.name);

    for (const pool of request.spotPools) {
      await this.step('spotPool', pool.name, org, async () => {
        const bidPrice = normalizeBidPrice(pool.bidPrice);
        await this.api.createSpotNodePool(org, {
          name: pool.name,
          org,
          cloudspace: request.name,
          serverClass: pool.serverClass,
          desired: pool.desired,
          bidPrice,
        });
      });
    }

    for (const pool of request.onDemandPools) {
      await this.step('onDemandPool', pool.name, org, () =>
        this.api.createOnDemandNodePool(org, {
          name: pool.name,
          org,
          cloudspace: request.name,
          serverClass: pool.serverClass,
          desired: pool.desired,
        }),
      );
    }

    let confirmed: Cloudspace;
    try {
      confirmed = await this.api.getCloudspace(org, request.name);
    } catch (error) {
      throw await this.fail(
        new ProvisioningError('cloudspace', request.name, error),
        org,
      );
    }

    this.entries.length = 0;
    return confirmed;
  }

  private async step(
    kind: ResourceKind,
    name: string,
    org: string,
    create: () => Promise<void>,
  ): Promise<void> {
    if (this.options.signal?.aborted) {
      throw await this.fail(
        new OperationCancelled(
          `operation cancelled before creating ${describeKind(kind)} ${name}`,
        ),
        org,
      );
    }

    try {
      await create();
    } catch (error) {
      throw await this.fail(new ProvisioningError(kind, name, error), org);
    }
    this.record(kind, name);
  }

  private checkCancelled(): void {
    if (this.options.signal?.aborted) {
      throw new OperationCancelled('operation cancelled before creation started');
    }
  }

  private record(kind: ResourceKind, name: string): void {
    this.entries.push({ resourceKind: kind, resourceName: name });
    this.logger.success(`Created ${describeKind(kind)} ${name}`);
  }

  private async fail<E extends OperationCancelled | ProvisioningError>(
    error: E,
    org: string,
  ): Promise<E> {
    error.rollbackWarnings = await this.rollback(org);
    return error;
  }

  /**
   * Deletes everything in the ledger, newest first. Failed deletes are
   * reported and skipped; this never throws.
   */
  private async rollback(org: string): Promise<RollbackWarning[]> {
    const warnings: RollbackWarning[] = [];
    if (this.entries.length > 0) {
      this.logger.warn('Rolling back created resources...');
    }

    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry) {
        break;
      }
      try {
        await this.remove(org, entry);
        this.logger.info(
          `Deleted ${describeKind(entry.resourceKind)} ${entry.resourceName}`,
        );
      } catch (error) {
        const warning: RollbackWarning = {
          ...entry,
          message: `failed to delete ${describeKind(entry.resourceKind)} ${entry.resourceName}: ${errorMessage(error)}`,
        };
        warnings.push(warning);
        this.logger.warn(warning.message);
      }
    }
    return warnings;
  }

  private remove(org: string, entry: LedgerEntry): Promise<void> {
    switch (entry.resourceKind) {
      case 'cloudspace':
        return this.api.deleteCloudspace(org, entry.resourceName);
      case 'spotPool':
        return this.api.deleteSpotNodePool(org, entry.resourceName);
      case 'onDemandPool':
        return this.api.deleteOnDemandNodePool(org, entry.resourceName);
    }
  }
}
