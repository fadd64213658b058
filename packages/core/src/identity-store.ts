/**
 * IdentityStore — read-only lookup of the service accounts and secrets a
 * build runs as.
 *
 * Implementations reject with NotFoundError when the object does not exist
 * and with LookupFailureError for any other backend failure.
 */
import type * as k8s from '@kubernetes/client-node';

export interface IdentityStore {
  getServiceAccount(namespace: string, name: string): Promise<k8s.V1ServiceAccount>;
  getSecret(namespace: string, name: string): Promise<k8s.V1Secret>;
}
