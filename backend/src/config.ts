import 'dotenv/config';
import { z } from 'zod';

const identifier = z
  .string()
  .trim()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a plain SQL identifier');

const envSchema = z.object({
  API_PORT: z.coerce.number().int().positive().default(8080),
  POSTGRES_HOST: z.string().default('localhost'),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_USER: z.string().default('rejections'),
  POSTGRES_PASSWORD: z.string().default(''),
  POSTGRES_DB: z.string().default('dev_stg'),
  REJECTIONS_SCHEMA: identifier.default('gnm_ct'),
  CLIENTS_SCHEMA: identifier.default('gnm_cf'),
  JWT_SECRET: z.string().min(1),
  UPLOAD_MAX_FILE_SIZE: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

const env = envSchema.parse(process.env);

export const config = {
  port: env.API_PORT,
  db: {
    host: env.POSTGRES_HOST,
    port: env.POSTGRES_PORT,
    user: env.POSTGRES_USER,
    password: env.POSTGRES_PASSWORD,
    database: env.POSTGRES_DB,
  },
  schemas: {
    rejections: env.REJECTIONS_SCHEMA,
    clients: env.CLIENTS_SCHEMA,
  },
  jwtSecret: env.JWT_SECRET,
  uploadMaxFileSize: env.UPLOAD_MAX_FILE_SIZE,
  logLevel: env.LOG_LEVEL,
};
