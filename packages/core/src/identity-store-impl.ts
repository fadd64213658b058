/**
 * Default IdentityStore backed by the Kubernetes core API.
 */
import * as k8s from '@kubernetes/client-node';
import { logger } from '@podsmith/shared';
import { LookupFailureError, NotFoundError, type IdentityKind } from './errors.js';
import type { IdentityStore } from './identity-store.js';

const log = logger.child({ module: 'identity-store' });

export type CoreApi = Pick<k8s.CoreV1Api, 'readNamespacedServiceAccount' | 'readNamespacedSecret'>;

function defaultCoreApi(): CoreApi {
  const kc = new k8s.KubeConfig();
  kc.loadFromDefault();
  return kc.makeApiClient(k8s.CoreV1Api);
}

function isNotFound(err: unknown): boolean {
  return err instanceof k8s.ApiException && err.code === 404;
}

async function lookup<T>(
  kind: IdentityKind,
  namespace: string,
  name: string,
  fetch: () => Promise<T>,
): Promise<T> {
  try {
    return await fetch();
  } catch (err) {
    if (isNotFound(err)) {
      throw new NotFoundError(kind, namespace, name, { cause: err });
    }
    log.error({ err, kind, namespace, name }, 'k8s lookup failed');
    throw new LookupFailureError(kind, namespace, name, { cause: err });
  }
}

/**
 * Create an IdentityStore that reads from the cluster.
 *
 * @param coreApi - Core API client; defaults to one built from the local kubeconfig
 *   or in-cluster service account.
 */
export function createK8sIdentityStore(coreApi: CoreApi = defaultCoreApi()): IdentityStore {
  return {
    getServiceAccount(namespace: string, name: string): Promise<k8s.V1ServiceAccount> {
      return lookup('ServiceAccount', namespace, name, () =>
        coreApi.readNamespacedServiceAccount({ name, namespace }),
      );
    },

    getSecret(namespace: string, name: string): Promise<k8s.V1Secret> {
      return lookup('Secret', namespace, name, () => coreApi.readNamespacedSecret({ name, namespace }));
    },
  };
}
