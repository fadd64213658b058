import type * as k8s from '@kubernetes/client-node';
import { logger } from '@podsmith/shared';
import type { CredentialBuilder } from './credentials/index.js';
import type { IdentityStore } from './identity-store.js';
import { implicitEnvVars, implicitVolumeMounts, WORKSPACE_DIR } from './implicit.js';
import { CREDS_INIT_NAME } from './naming.js';
import type { Build, CredentialInitializer } from './types.js';

const log = logger.child({ module: 'credential-initializer' });

export const DEFAULT_SERVICE_ACCOUNT = 'default';

export function serviceAccountNameFor(build: Build): string {
  return build.spec.serviceAccountName || DEFAULT_SERVICE_ACCOUNT;
}

export function secretVolumeName(secretName: string): string {
  return `secret-volume-${secretName}`;
}

/**
 * Build the container that prepares credentials for the rest of the pod.
 *
 * Every secret of the build's service account is offered to each builder;
 * a secret that matches at least one of them is mounted into the container
 * and its builders' arguments are passed along.
 */
export async function makeCredentialInitializer(
  build: Build,
  store: IdentityStore,
  builders: readonly CredentialBuilder[],
  credsImage: string,
): Promise<CredentialInitializer> {
  const namespace = build.metadata.namespace;
  const serviceAccountName = serviceAccountNameFor(build);

  const sa = await store.getServiceAccount(namespace, serviceAccountName);

  const volumes: k8s.V1Volume[] = [];
  const volumeMounts = implicitVolumeMounts();
  const args: string[] = [];

  for (const ref of sa.secrets ?? []) {
    if (!ref.name) {
      log.debug({ serviceAccount: serviceAccountName }, 'skipping unnamed secret reference');
      continue;
    }
    const secret = await store.getSecret(namespace, ref.name);
    const secretName = secret.metadata?.name ?? ref.name;

    let mountPath: string | undefined;
    for (const builder of builders) {
      const matched = builder.matchingAnnotations(secret);
      if (matched.length === 0) continue;
      args.push(...matched);
      mountPath ??= builder.mountPath(secretName);
    }

    if (mountPath === undefined) {
      log.debug({ secret: secretName }, 'secret matched no credential builder');
      continue;
    }

    const name = secretVolumeName(secretName);
    volumeMounts.push({ name, mountPath });
    volumes.push({ name, secret: { secretName } });
  }

  log.debug(
    { serviceAccount: serviceAccountName, secretVolumes: volumes.length, args: args.length },
    'credential initializer prepared',
  );

  return {
    container: {
      name: CREDS_INIT_NAME,
      image: credsImage,
      args,
      volumeMounts,
      env: implicitEnvVars(),
      workingDir: WORKSPACE_DIR,
    },
    volumes,
  };
}
