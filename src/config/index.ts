import { z } from 'zod';
import dotenv from 'dotenv';
import { readSecret } from '../utils/secrets.js';

dotenv.config();

// Mounted secret files take precedence over the environment
const secrets = {
  postgresPassword: readSecret('postgres_password', 'POSTGRES_PASSWORD') ?? '',
  redisPassword: readSecret('redis_password', 'REDIS_PASSWORD'),
};

const envFlag = z.enum(['true', 'false']).transform(v => v === 'true');

const configSchema = z.object({
  port: z.coerce.number().int().positive().default(3010),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

  storage: z.object({
    driver: z.enum(['postgres', 'memory']).default('postgres'),
  }),

  postgres: z.object({
    host: z.string().default('localhost'),
    port: z.coerce.number().default(5432),
    user: z.string().default('router'),
    password: z.string(),
    database: z.string().default('generation_router'),
    sslEnabled: envFlag.default('false'),
    poolMax: z.coerce.number().int().positive().default(10),
  }),

  redis: z.object({
    host: z.string().default('localhost'),
    port: z.coerce.number().default(6379),
    password: z.string().optional(),
    keyPrefix: z.string().default('router:'),
  }),

  routing: z.object({
    configPath: z.string().default('config/routing.yaml'),
    seed: z.string().default('router'),
  }),

  learning: z.object({
    enabled: envFlag.default('true'),
    intervalMs: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
  }),

  cors: z.object({
    origin: z.string().default('http://localhost:3000'),
  }),
});

const rawConfig = {
  port: process.env.PORT,
  nodeEnv: process.env.NODE_ENV,
  storage: {
    driver: process.env.STORAGE_DRIVER,
  },
  postgres: {
    host: process.env.POSTGRES_HOST,
    port: process.env.POSTGRES_PORT,
    user: process.env.POSTGRES_USER,
    password: secrets.postgresPassword,
    database: process.env.POSTGRES_DB,
    sslEnabled: process.env.POSTGRES_SSL,
    poolMax: process.env.POSTGRES_POOL_MAX,
  },
  redis: {
    host: process.env.REDIS_HOST,
    port: process.env.REDIS_PORT,
    password: secrets.redisPassword,
    keyPrefix: process.env.REDIS_KEY_PREFIX,
  },
  routing: {
    configPath: process.env.ROUTING_CONFIG_PATH,
    seed: process.env.ROUTING_SEED,
  },
  learning: {
    enabled: process.env.LEARNING_ENABLED,
    intervalMs: process.env.LEARNING_INTERVAL_MS,
  },
  cors: {
    origin: process.env.CORS_ORIGIN,
  },
};

export const config = configSchema.parse(rawConfig);
export type Config = z.infer<typeof configSchema>;
