import type * as k8s from '@kubernetes/client-node';

export const WORKSPACE_DIR = '/workspace';
export const HOME_DIR = '/builder/home';

export const WORKSPACE_VOLUME = 'workspace';
export const HOME_VOLUME = 'home';

// Every helper returns fresh objects: callers append to and patch them.

/** Environment injected into every source and step container. */
export function implicitEnvVars(): k8s.V1EnvVar[] {
  return [{ name: 'HOME', value: HOME_DIR }];
}

/** Mounts injected into every source and step container. */
export function implicitVolumeMounts(): k8s.V1VolumeMount[] {
  return [
    { name: WORKSPACE_VOLUME, mountPath: WORKSPACE_DIR },
    { name: HOME_VOLUME, mountPath: HOME_DIR },
  ];
}

/** Volumes backing the implicit mounts. */
export function implicitVolumes(): k8s.V1Volume[] {
  return [
    { name: WORKSPACE_VOLUME, emptyDir: {} },
    { name: HOME_VOLUME, emptyDir: {} },
  ];
}
