/**
 * Podman runtime driver.
 *
 * Implements {@link RuntimeDriver} using the Podman CLI. Podman is
 * daemonless and accepts the Docker verbs, so only the differences live
 * here:
 * - `:Z` suffix on all bind mounts for SELinux relabeling. Without this,
 *   SELinux-enabled hosts deny container access to mounted paths.
 * - The host is reachable as `host.containers.internal` out of the box.
 * - Version format uses `{{.Client.Version}}` (no server daemon).
 */

import { CliRuntimeDriver, type CliRuntimeOptions } from './cli-runtime.js';
import { PODMAN_HOST_ALIAS } from './constants.js';
import type { VolumeMount } from './runtime.js';

export type PodmanRuntimeOptions = CliRuntimeOptions;

export class PodmanRuntime extends CliRuntimeDriver {
  readonly name = 'podman' as const;
  readonly hostAlias = PODMAN_HOST_ALIAS;

  protected readonly versionTemplate = '{{.Client.Version}}';
  protected readonly displayName = 'Podman';

  constructor(options?: PodmanRuntimeOptions) {
    super('podman', options);
  }

  protected override formatVolume(volume: VolumeMount): string {
    const suffix = volume.readonly ? ':ro,Z' : ':Z';
    return `${volume.source}:${volume.target}${suffix}`;
  }
}
