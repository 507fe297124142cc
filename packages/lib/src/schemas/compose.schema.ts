/**
 * JSON Schema (draft-07) for the compose manifest subset we generate.
 * Used for test-time structural validation with ajv.
 */

const stringList = { type: "array", items: { type: "string", minLength: 1 } };

const serviceSchema = {
  type: "object",
  required: ["container_name", "image", "restart"],
  properties: {
    container_name: { type: "string", minLength: 1 },
    image: { type: "string", minLength: 1 },
    restart: { type: "string", enum: ["unless-stopped"] },
    command: { type: "string" },
    depends_on: stringList,
    environment: { type: "array", items: { type: "string", pattern: "^[A-Z_]+=" } },
    ports: { type: "array", items: { type: "string", pattern: "^(127\\.0\\.0\\.1:)?[0-9-]+:[0-9-]+(/tcp)?$" } },
    volumes: stringList,
  },
  additionalProperties: false,
};

export const composeFileSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  required: ["volumes", "services"],
  properties: {
    volumes: {
      type: "object",
      required: ["hookshotEncryptionData", "masPostgresData", "postgresData", "redisData"],
      additionalProperties: { type: "null" },
    },
    services: {
      type: "object",
      required: ["nginx", "synapse", "postgres"],
      additionalProperties: serviceSchema,
    },
  },
  additionalProperties: false,
};
