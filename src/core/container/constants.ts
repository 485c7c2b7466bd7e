/**
 * Shared constants for agent containers.
 *
 * Centralizes values used by the create-options builder, the driver listing and the
 * reconciler so the label names cannot drift apart.
 */

/** Every container agentdock creates carries `agentdock.managed=true`. */
export const LABEL_MANAGED = 'agentdock.managed';

/** Ownership label; `listManaged()` filters on it. */
export const LABEL_AGENT_ID = 'agentdock.agent.id';

export const LABEL_AGENT_NAME = 'agentdock.agent.name';

export const LABEL_USER_ID = 'agentdock.agent.user_id';

/** Container names are `<prefix>-<sanitized agent name>-<suffix>`. */
export const CONTAINER_NAME_PREFIX = 'agentdock-agent';

/** Where a RAG agent's knowledge directory is mounted inside the container. */
export const CONTAINER_KNOWLEDGE_PATH = '/app/data/knowledge';

/** Docker's alias for the host; Podman resolves its own without flags. */
export const DOCKER_HOST_ALIAS = 'host.docker.internal';

export const PODMAN_HOST_ALIAS = 'host.containers.internal';
