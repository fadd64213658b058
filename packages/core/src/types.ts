import type * as k8s from '@kubernetes/client-node';

// ---------------------------------------------------------------------------
// Build (input)
// ---------------------------------------------------------------------------

export interface BuildMetadata {
  name: string;
  namespace: string;
  uid: string;
}

/** Fields every source kind may carry. */
interface SourceCommon {
  /** Suffix for the generated container name; the source index is used when unset. */
  name?: string;
  /** Directory under the workspace the source is fetched into. */
  targetPath?: string;
  /** Sub-directory of the workspace volume mounted into every step. */
  subPath?: string;
}

export interface GitSourceSpec extends SourceCommon {
  kind: 'git';
  git: {
    url: string;
    revision: string;
  };
}

export type GcsSourceType = 'Archive' | 'Manifest';

export interface GcsSourceSpec extends SourceCommon {
  kind: 'gcs';
  gcs: {
    type: GcsSourceType;
    location: string;
  };
}

export interface CustomSourceSpec extends SourceCommon {
  kind: 'custom';
  /** Must be left unnamed; the translator assigns the name. */
  custom: k8s.V1Container;
}

export type SourceSpec = GitSourceSpec | GcsSourceSpec | CustomSourceSpec;
export type SourceKind = SourceSpec['kind'];

export interface BuildSpec {
  serviceAccountName?: string;
  /** Primary source; fetched before any of `sources`. */
  source?: SourceSpec;
  sources?: SourceSpec[];
  steps: k8s.V1Container[];
  volumes?: k8s.V1Volume[];
  nodeSelector?: Record<string, string>;
  affinity?: k8s.V1Affinity;
}

export interface Build {
  apiVersion?: string;
  kind?: string;
  metadata: BuildMetadata;
  spec: BuildSpec;
}

// ---------------------------------------------------------------------------
// Translator configuration
// ---------------------------------------------------------------------------

/** Container images the translator injects around the user's steps. */
export interface ImageConfig {
  /** Prepares credentials before any source or step runs. */
  credsImage: string;
  /** Fetches git sources. */
  gitImage: string;
  /** Fetches object-storage (GCS) sources. */
  gcsFetcherImage: string;
  /** Completion container run after every init container succeeded. */
  nopImage: string;
}

// ---------------------------------------------------------------------------
// Stage outputs
// ---------------------------------------------------------------------------

export interface CredentialInitializer {
  container: k8s.V1Container;
  volumes: k8s.V1Volume[];
}

/**
 * Where a step came from; drives its container name. A user step's index is
 * its position after the custom-source steps were put in front.
 */
export type StepOrigin =
  | { kind: 'user'; index: number }
  | { kind: 'custom-source'; sourceName?: string };

export interface PendingStep {
  origin: StepOrigin;
  container: k8s.V1Container;
}

export interface SourceArtifacts {
  /** Git and GCS fetch containers, in declaration order. */
  containers: k8s.V1Container[];
  /** Custom-source containers, last-declared first, to run ahead of the user's steps. */
  steps: PendingStep[];
  /** Last non-empty source sub-path, or '' when no source declared one. */
  workspaceSubPath: string;
}
