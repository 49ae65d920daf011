import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { AIDifficulty } from '../src/ai/types.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  HOST: z.string().default('0.0.0.0'),
  DATA_DIR: z.string().default(path.resolve(__dirname, '..', 'data')),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export interface ServerConfig {
  port: number;
  host: string;
  dataDir: string;
  modelsDir: string;
  sessionsDir: string;
  nodeEnv: 'development' | 'production' | 'test';
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  const dataDir = path.resolve(parsed.DATA_DIR);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    dataDir,
    modelsDir: path.join(dataDir, 'models'),
    sessionsDir: path.join(dataDir, 'sessions'),
    nodeEnv: parsed.NODE_ENV,
  };
}

/** Learned tables live in one directory per difficulty */
export function modelsDirFor(config: ServerConfig, difficulty: AIDifficulty): string {
  return path.join(config.modelsDir, difficulty);
}
