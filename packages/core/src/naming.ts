import type { SourceSpec, StepOrigin } from './types.js';

// IMPORTANT: log collection selects init containers by these prefixes.
export const INIT_CONTAINER_PREFIX = 'build-step-';
export const UNNAMED_INIT_CONTAINER_PREFIX = 'build-step-unnamed-';

export const CREDS_INIT_NAME = `${INIT_CONTAINER_PREFIX}credential-initializer`;
export const NOP_CONTAINER_NAME = 'nop';

const GIT_SOURCE = 'git-source';
const GCS_SOURCE = 'gcs-source';
export const CUSTOM_SOURCE = 'custom-source';

/** Container name for a git or GCS fetch container. */
export function sourceContainerName(source: Pick<SourceSpec, 'kind' | 'name'>, index: number): string {
  const base = source.kind === 'gcs' ? GCS_SOURCE : GIT_SOURCE;
  const suffix = source.name ? source.name : String(index);
  return `${INIT_CONTAINER_PREFIX}${base}-${suffix}`;
}

/** Name a custom-source container carries before step normalization. */
export function customSourceName(sourceName?: string): string {
  return sourceName ? `${CUSTOM_SOURCE}-${sourceName}` : CUSTOM_SOURCE;
}

/**
 * Final init container name of a step.
 *
 * Depends only on where the step came from and what the user called it, so
 * reordering steps never renames them.
 */
export function stepContainerName(origin: StepOrigin, userName?: string): string {
  if (origin.kind === 'custom-source') {
    return `${INIT_CONTAINER_PREFIX}${customSourceName(origin.sourceName)}`;
  }
  if (!userName) {
    return `${UNNAMED_INIT_CONTAINER_PREFIX}${origin.index}`;
  }
  return `${INIT_CONTAINER_PREFIX}${userName}`;
}
