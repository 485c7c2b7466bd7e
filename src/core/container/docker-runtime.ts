/**
 * Docker runtime driver.
 *
 * Reference implementation of {@link RuntimeDriver} using the Docker CLI
 * via `child_process.execFile`. No Docker SDK dependency, just shell out
 * to the `docker` binary.
 *
 * Docker-specific behavior:
 * - Standard bind mount semantics, no special suffixes needed.
 * - `--add-host host.docker.internal:host-gateway` on every create so the
 *   alias also resolves on Linux engines.
 * - Version comes from the daemon (`{{.Server.Version}}`).
 */

import { CliRuntimeDriver, type CliRuntimeOptions } from './cli-runtime.js';
import { DOCKER_HOST_ALIAS } from './constants.js';

export type DockerRuntimeOptions = CliRuntimeOptions;

export class DockerRuntime extends CliRuntimeDriver {
  readonly name = 'docker' as const;
  readonly hostAlias = DOCKER_HOST_ALIAS;

  protected readonly versionTemplate = '{{.Server.Version}}';
  protected readonly displayName = 'Docker';

  constructor(options?: DockerRuntimeOptions) {
    super('docker', options);
  }

  protected override extraCreateArgs(): string[] {
    return ['--add-host', `${DOCKER_HOST_ALIAS}:host-gateway`];
  }
}
