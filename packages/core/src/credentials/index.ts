import type { CredentialBuilder } from './builder.js';
import { createDockerCredentialBuilder } from './docker.js';
import { createGitCredentialBuilder } from './git.js';

export {
  SECRET_VOLUME_PATH,
  secretMountPath,
  sortAnnotations,
  type CredentialBuilder,
} from './builder.js';
export { createDockerCredentialBuilder, DOCKER_ANNOTATION_PREFIX } from './docker.js';
export { createGitCredentialBuilder, GIT_ANNOTATION_PREFIX } from './git.js';

/** Builders in the order their arguments are emitted: docker, then git. */
export function defaultCredentialBuilders(): CredentialBuilder[] {
  return [createDockerCredentialBuilder(), createGitCredentialBuilder()];
}
