export type ResourceKind = 'cloudspace' | 'spotPool' | 'onDemandPool';

export interface RollbackWarning {
  resourceKind: ResourceKind;
  resourceName: string;
  message: string;
}

export class CloudspaceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends CloudspaceError {}

export class ConflictingSource extends CloudspaceError {
  constructor(public readonly flags: string[]) {
    super(
      `--config cannot be combined with other flags (got: ${flags.map(toFlag).join(', ')})`,
    );
  }
}

export class UnknownParameter extends CloudspaceError {
  constructor(
    public readonly parameter: string,
    message = `unknown parameter: ${parameter}`,
  ) {
    super(message);
  }
}

export class ValidationError extends CloudspaceError {
  constructor(
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`${field}: ${reason}`);
  }
}

export class InvalidPrice extends CloudspaceError {
  constructor(
    public readonly raw: string,
    reason: string,
  ) {
    super(`invalid price ${JSON.stringify(raw)}: ${reason}`);
  }
}

/**
 * Non-2xx answer (or no answer at all) from the control plane.
 * `status` is 0 when the request never got a response.
 */
export class RemoteError extends CloudspaceError {
  constructor(
    message: string,
    public readonly status: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class RemoteUnauthorized extends RemoteError {}
export class RemoteForbidden extends RemoteError {}
export class RemoteNotFound extends RemoteError {}
export class RemoteConflict extends RemoteError {}
export class RemoteUnavailable extends RemoteError {}

export class OperationCancelled extends CloudspaceError {
  public rollbackWarnings: RollbackWarning[] = [];

  constructor(message = 'operation cancelled', options?: ErrorOptions) {
    super(message, options);
  }
}

export class ProvisioningError extends CloudspaceError {
  public rollbackWarnings: RollbackWarning[] = [];

  constructor(
    public readonly resourceKind: ResourceKind,
    public readonly resourceName: string,
    cause: unknown,
  ) {
    super(
      `failed to create ${describeKind(resourceKind)} ${resourceName}: ${errorMessage(cause)}`,
      { cause },
    );
  }
}

export function describeKind(kind: ResourceKind): string {
  switch (kind) {
    case 'cloudspace':
      return 'cloudspace';
    case 'spotPool':
      return 'spot node pool';
    case 'onDemandPool':
      return 'on-demand node pool';
  }
}

function toFlag(name: string): string {
  return `--${name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
