/**
 * Runtime JSON Schema for agent registration input, validated with ajv.
 *
 * Kept as a plain object so it can be fed directly to `ajv.compile()`.
 */

const containerConfigSchema = {
  type: 'object' as const,
  additionalProperties: false,
  properties: {
    image: { type: 'string', minLength: 1 },
    memoryLimit: { type: 'string', pattern: '^[0-9]+[bkmgBKMG]?$' },
    cpuLimit: { type: 'number', exclusiveMinimum: 0, maximum: 64 },
    envVars: {
      type: 'object',
      additionalProperties: { type: 'string' },
      propertyNames: { pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
    },
    autoStart: { type: 'boolean' },
  },
};

const knowledgeBaseSchema = {
  type: 'object' as const,
  properties: {
    recreate: { type: 'boolean' },
    chunk_size: { type: 'integer', minimum: 1 },
    chunk_overlap: { type: 'integer', minimum: 0 },
  },
};

export const AGENT_INPUT_JSON_SCHEMA = {
  $id: 'agentdock/agent-input.json',
  type: 'object' as const,
  required: ['name', 'type'],
  additionalProperties: false,
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 128 },
    type: { type: 'string', enum: ['rag', 'chat', 'function', 'custom'] },
    description: { type: 'string', maxLength: 2048 },
    userId: { type: 'string', minLength: 1 },
    containerConfig: containerConfigSchema,
    config: {
      type: 'object',
      properties: {
        knowledge_base: knowledgeBaseSchema,
      },
    },
  },
};
