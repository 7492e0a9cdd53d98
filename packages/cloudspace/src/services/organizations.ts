import { RemoteNotFound } from '../errors.js';
import type { CloudspaceApi } from './api.js';
import type { Organization } from '../types.js';

export async function listOrganizations(api: CloudspaceApi): Promise<Organization[]> {
  const organizations = await api.listOrganizations();
  return [...organizations].sort((a, b) => a.name.localeCompare(b.name));
}

// The control plane only lists organizations, so a lookup filters the list.
export async function getOrganization(
  api: CloudspaceApi,
  name: string,
): Promise<Organization> {
  const found = (await api.listOrganizations()).find((org) => org.name === name);
  if (!found) {
    throw new RemoteNotFound(`organization ${name} not found`, 404);
  }
  return found;
}
