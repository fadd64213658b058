/**
 * @podsmith/core — Build to Pod translation.
 *
 * - BuildPodTranslator: turns a Build into the Pod that runs it
 * - IdentityStore: service account / secret lookups (Kubernetes-backed by default)
 * - CredentialBuilder: classifies secrets for the credential initializer
 * - parseBuild: validates raw Build resources
 */

// Model
export type {
  Build,
  BuildMetadata,
  BuildSpec,
  SourceSpec,
  SourceKind,
  GitSourceSpec,
  GcsSourceSpec,
  GcsSourceType,
  CustomSourceSpec,
  ImageConfig,
  StepOrigin,
} from './types.js';

// Errors
export {
  BuildTranslationError,
  MissingFieldError,
  NotFoundError,
  LookupFailureError,
  InvalidVolumeError,
  InvalidBuildError,
  type IdentityKind,
} from './errors.js';

// Translation
export {
  BuildPodTranslator,
  buildOwnerReference,
  BUILD_API_VERSION,
  BUILD_KIND,
  BUILD_NAME_LABEL,
  SIDECAR_INJECT_ANNOTATION,
  type BuildPodTranslatorOptions,
} from './translator.js';
export { DEFAULT_SERVICE_ACCOUNT, secretVolumeName } from './credential-initializer.js';
export { WORKSPACE_DIR, HOME_DIR } from './implicit.js';
export {
  INIT_CONTAINER_PREFIX,
  UNNAMED_INIT_CONTAINER_PREFIX,
  CREDS_INIT_NAME,
  NOP_CONTAINER_NAME,
  stepContainerName,
} from './naming.js';
export { validateVolumes } from './volumes.js';
export { parseBuild, rawBuildSchema, type RawBuild } from './build-schema.js';

// Configuration
export { loadImageConfig, DEFAULT_IMAGES } from './config.js';

// Identity lookups
export type { IdentityStore } from './identity-store.js';
export { createK8sIdentityStore, type CoreApi } from './identity-store-impl.js';

// Credentials
export {
  defaultCredentialBuilders,
  createDockerCredentialBuilder,
  createGitCredentialBuilder,
  SECRET_VOLUME_PATH,
  type CredentialBuilder,
} from './credentials/index.js';
