import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NEO4J_URI: z.string().default("bolt://neo4j:7687"),
  NEO4J_USER: z.string().default("neo4j"),
  NEO4J_USERNAME: optionalString,
  NEO4J_PASSWORD: z.string().default(""),
  NEO4J_DATABASE: optionalString,

  INFLUX_HOST: optionalString,
  INFLUX_TOKEN: optionalString,
  INFLUX_ORG: optionalString,
  INFLUX_BUCKET: optionalString,
  INFLUX_SENSOR_TAG: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain tag key")
    .default("sensor_id"),
  INFLUX_FIELD: optionalString,

  SENSOR_CONFIG_PATH: optionalString,

  QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TOPOLOGY_RESULT_LIMIT: z.coerce.number().int().positive().max(10_000).default(500),

  PORT: z.coerce.number().int().positive().default(3000)
});

export type AppConfig = Omit<z.infer<typeof EnvSchema>, "NEO4J_USERNAME">;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error(parsed.error.format());
    throw new Error("Invalid environment configuration");
  }
  const { NEO4J_USERNAME, ...rest } = parsed.data;
  return { ...rest, NEO4J_USER: NEO4J_USERNAME ?? rest.NEO4J_USER };
}
