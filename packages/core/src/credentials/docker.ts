import type * as k8s from '@kubernetes/client-node';
import {
  ANNOTATION_GROUP,
  SECRET_TYPE_BASIC_AUTH,
  secretMountPath,
  sortAnnotations,
  type CredentialBuilder,
} from './builder.js';

export const DOCKER_ANNOTATION_PREFIX = `${ANNOTATION_GROUP}/docker-`;

/**
 * Basic-auth secrets annotated with `build.podsmith.dev/docker-<n>: <registry>`.
 */
export function createDockerCredentialBuilder(): CredentialBuilder {
  return {
    kind: 'docker',
    matchingAnnotations(secret: k8s.V1Secret): string[] {
      const name = secret.metadata?.name ?? '';
      if (secret.type !== SECRET_TYPE_BASIC_AUTH) return [];
      return sortAnnotations(secret.metadata?.annotations, DOCKER_ANNOTATION_PREFIX).map(
        (registry) => `-basic-docker=${name}=${registry}`,
      );
    },
    mountPath: secretMountPath,
  };
}
