import type * as k8s from '@kubernetes/client-node';
import { NotFoundError } from '../errors.js';
import type { IdentityStore } from '../identity-store.js';
import type { Build, BuildSpec, ImageConfig } from '../types.js';

export const TEST_NAMESPACE = 'ci';

export const TEST_IMAGES: ImageConfig = {
  credsImage: 'test-creds:1',
  gitImage: 'test-git:1',
  gcsFetcherImage: 'test-gcs:1',
  nopImage: 'test-nop:1',
};

export function makeBuild(spec: Partial<BuildSpec> = {}, name = 'test-build'): Build {
  return {
    metadata: { name, namespace: TEST_NAMESPACE, uid: 'test-uid' },
    spec: { steps: [], ...spec },
  };
}

export function serviceAccount(name: string, secrets: string[] = []): k8s.V1ServiceAccount {
  return {
    metadata: { name, namespace: TEST_NAMESPACE },
    secrets: secrets.map((secret) => ({ name: secret })),
  };
}

export function secret(
  name: string,
  type: string,
  annotations: Record<string, string> = {},
): k8s.V1Secret {
  return {
    metadata: { name, namespace: TEST_NAMESPACE, annotations },
    type,
  };
}

/** In-process IdentityStore that records every lookup. */
export class MemoryIdentityStore implements IdentityStore {
  readonly lookups: string[] = [];
  private readonly serviceAccounts = new Map<string, k8s.V1ServiceAccount>();
  private readonly secrets = new Map<string, k8s.V1Secret>();

  constructor(seed: { serviceAccounts?: k8s.V1ServiceAccount[]; secrets?: k8s.V1Secret[] } = {}) {
    for (const sa of seed.serviceAccounts ?? []) {
      this.serviceAccounts.set(`${sa.metadata?.namespace}/${sa.metadata?.name}`, sa);
    }
    for (const s of seed.secrets ?? []) {
      this.secrets.set(`${s.metadata?.namespace}/${s.metadata?.name}`, s);
    }
  }

  async getServiceAccount(namespace: string, name: string): Promise<k8s.V1ServiceAccount> {
    this.lookups.push(`ServiceAccount ${namespace}/${name}`);
    const sa = this.serviceAccounts.get(`${namespace}/${name}`);
    if (!sa) throw new NotFoundError('ServiceAccount', namespace, name);
    return structuredClone(sa);
  }

  async getSecret(namespace: string, name: string): Promise<k8s.V1Secret> {
    this.lookups.push(`Secret ${namespace}/${name}`);
    const s = this.secrets.get(`${namespace}/${name}`);
    if (!s) throw new NotFoundError('Secret', namespace, name);
    return structuredClone(s);
  }
}

/** Store holding only a `default` service account without secrets. */
export function defaultStore(): MemoryIdentityStore {
  return new MemoryIdentityStore({ serviceAccounts: [serviceAccount('default')] });
}
