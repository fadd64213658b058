import type * as k8s from '@kubernetes/client-node';

/** Root under which matched secrets are mounted into the credential initializer. */
export const SECRET_VOLUME_PATH = '/var/build-secrets';

export const ANNOTATION_GROUP = 'build.podsmith.dev';

export const SECRET_TYPE_BASIC_AUTH = 'kubernetes.io/basic-auth';
export const SECRET_TYPE_SSH_AUTH = 'kubernetes.io/ssh-auth';

/**
 * Recognizes credential-bearing secrets and turns them into arguments for
 * the credential initializer.
 */
export interface CredentialBuilder {
  /** Short identifier, used in logs. */
  readonly kind: string;
  /** Initializer arguments for `secret`; empty when the secret is not for this builder. */
  matchingAnnotations(secret: k8s.V1Secret): string[];
  /** Where the secret is mounted into the initializer container. */
  mountPath(secretName: string): string;
}

export function secretMountPath(secretName: string): string {
  return `${SECRET_VOLUME_PATH}/${secretName}`;
}

/**
 * Values of the annotations whose key starts with `prefix`, ordered by key.
 */
export function sortAnnotations(annotations: Record<string, string> | undefined, prefix: string): string[] {
  if (!annotations) return [];
  return Object.keys(annotations)
    .filter((key) => key.startsWith(prefix))
    .sort()
    .map((key) => annotations[key] ?? '');
}
