import path from 'path';
import { z } from 'zod';
import { parseRoleList } from '../src/auth/roles.js';
import type { Role } from '../src/types/records.js';

const roleList = z.string().transform((value, ctx): Role[] => {
  try {
    return parseRoleList(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
    return z.NEVER;
  }
});

const flag = z
  .enum(['true', 'false', '1', '0', ''])
  .default('false')
  .transform(v => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATA_DIR: z.string().default('data'),
  CORS_ORIGIN: z.string().default('*'),
  UPLOAD_LIMIT_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  IMPORT_ROLES: roleList.default('Administrator'),
  WRITE_ROLES: roleList.default('Administrator,Manager,Engineer'),
  ADMIN_PASSWORD: z.string().min(1).default('admin123'),
  ADMIN_EMAIL: z.string().default(''),
  DEMO_MODE: flag,
  GROQ_API_KEY: z.string().default(''),
  GROQ_MODEL: z.string().default('llama-3.1-8b-instant'),
  OLLAMA_URL: z.string().default(''),
  OLLAMA_MODEL: z.string().default('llama2'),
  ASSISTANT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = {
  port: number;
  dataDir: string;
  corsOrigin: string;
  uploadLimitBytes: number;
  importRoles: Role[];
  writeRoles: Role[];
  adminPassword: string;
  adminEmail: string;
  demoMode: boolean;
  groq: { apiKey: string; model: string };
  ollama: { url: string; model: string };
  assistantTimeoutMs: number;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    dataDir: path.resolve(e.DATA_DIR),
    corsOrigin: e.CORS_ORIGIN,
    uploadLimitBytes: e.UPLOAD_LIMIT_BYTES,
    importRoles: e.IMPORT_ROLES,
    writeRoles: e.WRITE_ROLES,
    adminPassword: e.ADMIN_PASSWORD,
    adminEmail: e.ADMIN_EMAIL,
    demoMode: e.DEMO_MODE,
    groq: { apiKey: e.GROQ_API_KEY, model: e.GROQ_MODEL },
    ollama: { url: e.OLLAMA_URL, model: e.OLLAMA_MODEL },
    assistantTimeoutMs: e.ASSISTANT_TIMEOUT_MS,
  };
}
