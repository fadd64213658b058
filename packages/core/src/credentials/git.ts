import type * as k8s from '@kubernetes/client-node';
import {
  ANNOTATION_GROUP,
  SECRET_TYPE_BASIC_AUTH,
  SECRET_TYPE_SSH_AUTH,
  secretMountPath,
  sortAnnotations,
  type CredentialBuilder,
} from './builder.js';

export const GIT_ANNOTATION_PREFIX = `${ANNOTATION_GROUP}/git-`;

const FLAG_BY_TYPE: Record<string, string> = {
  [SECRET_TYPE_BASIC_AUTH]: '-basic-git',
  [SECRET_TYPE_SSH_AUTH]: '-ssh-git',
};

/**
 * Basic-auth or SSH secrets annotated with `build.podsmith.dev/git-<n>: <host url>`.
 */
export function createGitCredentialBuilder(): CredentialBuilder {
  return {
    kind: 'git',
    matchingAnnotations(secret: k8s.V1Secret): string[] {
      const flag = secret.type ? FLAG_BY_TYPE[secret.type] : undefined;
      if (!flag) return [];
      const name = secret.metadata?.name ?? '';
      return sortAnnotations(secret.metadata?.annotations, GIT_ANNOTATION_PREFIX).map(
        (host) => `${flag}=${name}=${host}`,
      );
    },
    mountPath: secretMountPath,
  };
}
