import { posix } from 'node:path';
import type * as k8s from '@kubernetes/client-node';
import { implicitEnvVars, implicitVolumeMounts, WORKSPACE_DIR, WORKSPACE_VOLUME } from './implicit.js';
import { stepContainerName } from './naming.js';
import type { PendingStep } from './types.js';

/** Lexically clean a mount path: collapse `.`/`..`/duplicate slashes, drop a trailing slash. */
export function cleanMountPath(mountPath: string): string {
  const normalized = posix.normalize(mountPath);
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Put the custom-source steps ahead of the user's steps. A user step's index
 * is its position in the merged list, so custom-source steps shift it.
 */
export function mergeSteps(customSteps: readonly PendingStep[], steps: readonly k8s.V1Container[]): PendingStep[] {
  const offset = customSteps.length;
  return [
    ...customSteps,
    ...steps.map((container, i): PendingStep => ({
      origin: { kind: 'user', index: offset + i },
      container,
    })),
  ];
}

/**
 * Inject implicit env and mounts into a step, default its working
 * directory and assign its final name. Returns a new container.
 */
export function normalizeStep(step: PendingStep, workspaceSubPath: string): k8s.V1Container {
  const container = step.container;

  const claimed = new Set((container.volumeMounts ?? []).map((vm) => cleanMountPath(vm.mountPath)));
  const volumeMounts = [...(container.volumeMounts ?? [])];
  for (const mount of implicitVolumeMounts()) {
    if (claimed.has(cleanMountPath(mount.mountPath))) continue;
    if (workspaceSubPath && mount.name === WORKSPACE_VOLUME) {
      mount.subPath = workspaceSubPath;
    }
    volumeMounts.push(mount);
  }

  return {
    ...container,
    name: stepContainerName(step.origin, container.name),
    env: [...implicitEnvVars(), ...(container.env ?? [])],
    volumeMounts,
    workingDir: container.workingDir || WORKSPACE_DIR,
  };
}
