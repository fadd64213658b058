import { posix } from 'node:path';
import type * as k8s from '@kubernetes/client-node';
import { logger } from '@podsmith/shared';
import { MissingFieldError } from './errors.js';
import { implicitEnvVars, implicitVolumeMounts, WORKSPACE_DIR } from './implicit.js';
import { customSourceName, sourceContainerName } from './naming.js';
import type {
  Build,
  CustomSourceSpec,
  GcsSourceSpec,
  GitSourceSpec,
  ImageConfig,
  PendingStep,
  SourceArtifacts,
  SourceSpec,
} from './types.js';

const log = logger.child({ module: 'sources' });

/** The primary source (if any) followed by the additional sources. */
export function collectSources(build: Build): SourceSpec[] {
  const sources: SourceSpec[] = [];
  if (build.spec.source) sources.push(build.spec.source);
  sources.push(...(build.spec.sources ?? []));
  return sources;
}

function fetchContainer(name: string, image: string, args: string[]): k8s.V1Container {
  return {
    name,
    image,
    args,
    volumeMounts: implicitVolumeMounts(),
    workingDir: WORKSPACE_DIR,
    env: implicitEnvVars(),
  };
}

/** Dotted path of the source at `index` of collectSources(build). */
export function sourcePath(build: Build, index: number): string {
  if (build.spec.source) {
    return index === 0 ? 'spec.source' : `spec.sources.${index - 1}`;
  }
  return `spec.sources.${index}`;
}

export function gitToContainer(
  source: GitSourceSpec,
  index: number,
  image: string,
  path = 'spec.source',
): k8s.V1Container {
  const { url, revision } = source.git;
  if (!url) throw new MissingFieldError(`${path}.git.url`);
  if (!revision) throw new MissingFieldError(`${path}.git.revision`);

  const args = ['-url', url, '-revision', revision];
  if (source.targetPath) {
    args.push('-path', source.targetPath);
  }
  return fetchContainer(sourceContainerName(source, index), image, args);
}

export function gcsToContainer(
  source: GcsSourceSpec,
  index: number,
  image: string,
  path = 'spec.source',
): k8s.V1Container {
  const { type, location } = source.gcs;
  if (!location) throw new MissingFieldError(`${path}.gcs.location`);

  const args = ['--type', type, '--location', location];
  if (source.targetPath) {
    args.push('--dest_dir', posix.join(WORKSPACE_DIR, source.targetPath));
  }
  return fetchContainer(sourceContainerName(source, index), image, args);
}

/**
 * Turn a custom source into a step. The caller's container must be unnamed;
 * the returned copy carries the custom-source name.
 */
export function customToStep(source: CustomSourceSpec, path = 'spec.source'): PendingStep {
  if (source.custom.name) {
    throw new MissingFieldError(`${path}.custom.name`);
  }
  return {
    origin: { kind: 'custom-source', sourceName: source.name || undefined },
    container: { ...structuredClone(source.custom), name: customSourceName(source.name) },
  };
}

/**
 * Produce the fetch containers and custom-source steps for every source of
 * the build. Fetch containers keep declaration order; each custom-source
 * step is put in front of the ones before it, so they run last-declared first.
 */
export function makeSourceArtifacts(
  build: Build,
  images: Pick<ImageConfig, 'gitImage' | 'gcsFetcherImage'>,
): SourceArtifacts {
  const containers: k8s.V1Container[] = [];
  const steps: PendingStep[] = [];
  let workspaceSubPath = '';

  collectSources(build).forEach((source, index) => {
    const path = sourcePath(build, index);
    switch (source.kind) {
      case 'git':
        containers.push(gitToContainer(source, index, images.gitImage, path));
        break;
      case 'gcs':
        containers.push(gcsToContainer(source, index, images.gcsFetcherImage, path));
        break;
      case 'custom':
        steps.unshift(customToStep(source, path));
        break;
      default: {
        // Kinds introduced after this translator was written are ignored.
        const unknown: { kind?: unknown } = source;
        log.debug({ index, kind: unknown.kind }, 'skipping source of unknown kind');
        return;
      }
    }
    // Admission rejects builds where more than one source sets a sub-path.
    if (source.subPath) {
      workspaceSubPath = source.subPath;
    }
  });

  return { containers, steps, workspaceSubPath };
}
