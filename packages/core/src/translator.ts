import type * as k8s from '@kubernetes/client-node';
import { logger, withSpan } from '@podsmith/shared';
import { makeCredentialInitializer } from './credential-initializer.js';
import { defaultCredentialBuilders, type CredentialBuilder } from './credentials/index.js';
import type { IdentityStore } from './identity-store.js';
import { implicitVolumes } from './implicit.js';
import { NOP_CONTAINER_NAME } from './naming.js';
import { makeSourceArtifacts } from './sources.js';
import { mergeSteps, normalizeStep } from './steps.js';
import type { Build, ImageConfig } from './types.js';
import { validateVolumes } from './volumes.js';

const log = logger.child({ module: 'translator' });

export const BUILD_API_GROUP = 'build.podsmith.dev';
export const BUILD_API_VERSION = `${BUILD_API_GROUP}/v1alpha1`;
export const BUILD_KIND = 'Build';

/** Label carrying the owning build's name on every pod. */
export const BUILD_NAME_LABEL = `${BUILD_API_GROUP}/buildName`;
export const SIDECAR_INJECT_ANNOTATION = 'sidecar.istio.io/inject';

export interface BuildPodTranslatorOptions {
  /** Service account and secret lookups. */
  store: IdentityStore;
  images: ImageConfig;
  /** Credential builders, in argument order (default: docker, git). */
  builders?: readonly CredentialBuilder[];
}

/** Controller reference that ties the pod's lifetime to its build. */
export function buildOwnerReference(build: Build): k8s.V1OwnerReference {
  return {
    apiVersion: BUILD_API_VERSION,
    kind: BUILD_KIND,
    name: build.metadata.name,
    uid: build.metadata.uid,
    controller: true,
    blockOwnerDeletion: true,
  };
}

/**
 * Translates a Build into the Pod that executes it.
 *
 * The pod runs, as init containers and in this order: the credential
 * initializer, one fetch container per git/GCS source, custom-source steps
 * (last-declared first), then the user's steps. A single `nop` container follows; the build has
 * succeeded once it runs.
 */
export class BuildPodTranslator {
  private readonly store: IdentityStore;
  private readonly images: ImageConfig;
  private readonly builders: readonly CredentialBuilder[];

  constructor(opts: BuildPodTranslatorOptions) {
    this.store = opts.store;
    this.images = { ...opts.images };
    this.builders = opts.builders ?? defaultCredentialBuilders();
  }

  async makePod(input: Build): Promise<k8s.V1Pod> {
    return withSpan(
      'build.translate',
      { 'build.name': input.metadata.name, 'build.namespace': input.metadata.namespace },
      () => this.translate(structuredClone(input)),
    );
  }

  private async translate(build: Build): Promise<k8s.V1Pod> {
    const cred = await makeCredentialInitializer(build, this.store, this.builders, this.images.credsImage);
    const sources = makeSourceArtifacts(build, this.images);

    const steps = mergeSteps(sources.steps, build.spec.steps).map((step) =>
      normalizeStep(step, sources.workspaceSubPath),
    );
    const initContainers = [cred.container, ...sources.containers, ...steps];

    const volumes = [...(build.spec.volumes ?? []), ...implicitVolumes(), ...cred.volumes];
    validateVolumes(volumes);

    log.info(
      {
        build: build.metadata.name,
        namespace: build.metadata.namespace,
        initContainers: initContainers.length,
        volumes: volumes.length,
      },
      'build pod prepared',
    );

    return {
      apiVersion: 'v1',
      kind: 'Pod',
      metadata: {
        // Same namespace as the build so it can reach colocated resources.
        namespace: build.metadata.namespace,
        generateName: `${build.metadata.name}-`,
        ownerReferences: [buildOwnerReference(build)],
        annotations: {
          [SIDECAR_INJECT_ANNOTATION]: 'false',
        },
        labels: {
          [BUILD_NAME_LABEL]: build.metadata.name,
        },
      },
      spec: {
        restartPolicy: 'Never',
        initContainers,
        containers: [{ name: NOP_CONTAINER_NAME, image: this.images.nopImage }],
        serviceAccountName: build.spec.serviceAccountName,
        volumes,
        nodeSelector: build.spec.nodeSelector,
        affinity: build.spec.affinity,
      },
    };
  }
}
