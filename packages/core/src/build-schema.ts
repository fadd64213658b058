/**
 * Parsing of Build resources as they arrive over the wire.
 *
 * On the wire each source carries optional `git`, `gcs` and `custom`
 * fields; exactly one must be set. The typed model uses a `kind`
 * discriminant instead.
 */
import type * as k8s from '@kubernetes/client-node';
import { z } from 'zod';
import { InvalidBuildError } from './errors.js';
import type { Build, SourceSpec } from './types.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVolumeMount(value: unknown): boolean {
  return isObject(value) && typeof value.name === 'string' && typeof value.mountPath === 'string';
}

function isContainer(value: unknown): boolean {
  if (!isObject(value)) return false;
  if (value.name !== undefined && typeof value.name !== 'string') return false;
  const mounts = value.volumeMounts;
  return mounts === undefined || (Array.isArray(mounts) && mounts.every(isVolumeMount));
}

const containerSchema = z
  .custom<k8s.V1Container>(isContainer, 'expected a container object with named volume mounts and mount paths')
  .transform((container) => ({ ...container, name: container.name ?? '' }));

const volumeSchema = z.custom<k8s.V1Volume>(
  (value) => isObject(value) && typeof value.name === 'string',
  'expected a volume object with a name',
);

const affinitySchema = z.custom<k8s.V1Affinity>(isObject, 'expected an affinity object');

const rawSourceSchema = z.object({
  name: z.string().optional(),
  targetPath: z.string().optional(),
  subPath: z.string().optional(),
  git: z
    .object({
      url: z.string().default(''),
      revision: z.string().default(''),
    })
    .optional(),
  gcs: z
    .object({
      type: z.enum(['Archive', 'Manifest']).default('Archive'),
      location: z.string().default(''),
    })
    .optional(),
  custom: containerSchema.optional(),
});

type RawSource = z.infer<typeof rawSourceSchema>;

export const rawBuildSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: z.object({
    name: z.string().min(1),
    namespace: z.string().min(1).default('default'),
    uid: z.string().default(''),
  }),
  spec: z.object({
    serviceAccountName: z.string().optional(),
    source: rawSourceSchema.optional(),
    sources: z.array(rawSourceSchema).optional(),
    steps: z.array(containerSchema).default([]),
    volumes: z.array(volumeSchema).optional(),
    nodeSelector: z.record(z.string()).optional(),
    affinity: affinitySchema.optional(),
  }),
});

export type RawBuild = z.input<typeof rawBuildSchema>;

function toSourceSpec(raw: RawSource, path: string): SourceSpec {
  const { git, gcs, custom, ...common } = raw;
  const populated = [git && 'git', gcs && 'gcs', custom && 'custom'].filter(Boolean);
  if (populated.length === 0) {
    throw new InvalidBuildError(path, 'expected exactly one of: git, gcs, custom');
  }
  if (populated.length > 1) {
    throw new InvalidBuildError(path, `expected exactly one of: git, gcs, custom; found ${populated.join(', ')}`);
  }

  if (git) return { ...common, kind: 'git', git };
  if (gcs) return { ...common, kind: 'gcs', gcs };
  if (custom) return { ...common, kind: 'custom', custom };
  throw new InvalidBuildError(path, 'expected exactly one of: git, gcs, custom');
}

/**
 * Validate a raw Build resource and convert it to the typed model.
 *
 * @throws InvalidBuildError on the first structural problem found.
 */
export function parseBuild(raw: unknown): Build {
  const result = rawBuildSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new InvalidBuildError(path, issue?.message ?? 'invalid build');
  }

  const { apiVersion, kind, metadata, spec } = result.data;
  const { source, sources, ...rest } = spec;

  return {
    apiVersion,
    kind,
    metadata,
    spec: {
      ...rest,
      source: source ? toSourceSpec(source, 'spec.source') : undefined,
      sources: sources?.map((s, i) => toSourceSpec(s, `spec.sources.${i}`)),
    },
  };
}
