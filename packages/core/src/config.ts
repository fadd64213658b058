import { logger } from '@podsmith/shared';
import type { ImageConfig } from './types.js';

const log = logger.child({ module: 'config' });

export const DEFAULT_IMAGES: Readonly<ImageConfig> = {
  credsImage: 'override-with-creds:latest',
  gitImage: 'override-with-git:latest',
  gcsFetcherImage: 'gcr.io/cloud-builders/gcs-fetcher:latest',
  nopImage: 'override-with-nop:latest',
};

const ENV_KEYS: Record<keyof ImageConfig, string> = {
  credsImage: 'CREDS_IMAGE',
  gitImage: 'GIT_IMAGE',
  gcsFetcherImage: 'GCS_FETCHER_IMAGE',
  nopImage: 'NOP_IMAGE',
};

function pick(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

/**
 * Resolve the injected container images.
 *
 * Each image is taken from `overrides`, then from its env var
 * (CREDS_IMAGE, GIT_IMAGE, GCS_FETCHER_IMAGE, NOP_IMAGE), then from
 * DEFAULT_IMAGES. Empty strings count as unset.
 */
export function loadImageConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ImageConfig> = {},
): ImageConfig {
  const resolve = (key: keyof ImageConfig): string =>
    pick(overrides[key], pick(env[ENV_KEYS[key]], DEFAULT_IMAGES[key]));

  const config: ImageConfig = {
    credsImage: resolve('credsImage'),
    gitImage: resolve('gitImage'),
    gcsFetcherImage: resolve('gcsFetcherImage'),
    nopImage: resolve('nopImage'),
  };

  log.info({ images: config }, 'image config resolved');
  return config;
}
