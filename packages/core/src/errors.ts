export class BuildTranslationError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BuildTranslationError';
  }
}

/** A required field was empty, or a field that must stay empty was set. */
export class MissingFieldError extends BuildTranslationError {
  constructor(readonly path: string) {
    super('MISSING_FIELD', `missing field(s): ${path}`);
    this.name = 'MissingFieldError';
  }
}

export type IdentityKind = 'ServiceAccount' | 'Secret';

export class NotFoundError extends BuildTranslationError {
  constructor(
    readonly kind: IdentityKind,
    readonly namespace: string,
    readonly resourceName: string,
    options?: { cause?: unknown },
  ) {
    super('NOT_FOUND', `${kind} "${namespace}/${resourceName}" not found`, options);
    this.name = 'NotFoundError';
  }
}

export class LookupFailureError extends BuildTranslationError {
  constructor(
    readonly kind: IdentityKind,
    readonly namespace: string,
    readonly resourceName: string,
    options?: { cause?: unknown },
  ) {
    super('LOOKUP_FAILURE', `failed to look up ${kind} "${namespace}/${resourceName}"`, options);
    this.name = 'LookupFailureError';
  }
}

export class InvalidVolumeError extends BuildTranslationError {
  constructor(
    readonly volumeName: string,
    readonly reason: string,
  ) {
    super('INVALID_VOLUME', `invalid volume "${volumeName}": ${reason}`);
    this.name = 'InvalidVolumeError';
  }
}

export class InvalidBuildError extends BuildTranslationError {
  constructor(
    readonly path: string,
    reason: string,
  ) {
    super('INVALID_BUILD', `invalid build at ${path}: ${reason}`);
    this.name = 'InvalidBuildError';
  }
}
