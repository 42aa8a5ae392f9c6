import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { DEFAULT_FRAME_INTERVAL_MS, DEFAULT_MAX_QUEUED_BYTES } from '@gridrelay/protocol';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform(value => value === 'true' || value === '1');

const port = z.coerce.number().int().min(0).max(65535);

const ConfigSchema = z.object({
  SSH_PORT: port.default(2222),
  SSH_HOST_KEY_PATH: z.string().min(1).default('./keys/host.key'),
  STATS_PORT: port.default(3000),
  CAPTURE_PATH: z.string().min(1).optional(),
  FRAME_INTERVAL_MS: z.coerce.number().int().min(10).default(DEFAULT_FRAME_INTERVAL_MS),
  BYPASS_MODE: booleanFlag,
  MAX_QUEUED_BYTES: z.coerce.number().int().min(1024).default(DEFAULT_MAX_QUEUED_BYTES),
  RELAY_PASSWORD: z.string().min(1).optional(),
});

export interface RelayConfig {
  sshPort: number;
  hostKeyPath: string;
  /** 0 disables the stats server */
  statsPort: number;
  capturePath: string;
  frameIntervalMs: number;
  bypassMode: boolean;
  maxQueuedBytes: number;
  password?: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Location of the bundled demo capture, from src/ during development or from
 * the compiled output
 */
export function defaultCapturePath(): string {
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  const locations = [
    path.join(__dirname, '../captures/demo.json'),
    path.join(__dirname, '../../../../apps/console-relay/captures/demo.json'),
  ];
  return locations.find(loc => fs.existsSync(loc)) ?? locations[0] ?? 'captures/demo.json';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  // Treat empty variables from .env files as unset
  const defined = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = ConfigSchema.safeParse(defined);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    sshPort: parsed.SSH_PORT,
    hostKeyPath: parsed.SSH_HOST_KEY_PATH,
    statsPort: parsed.STATS_PORT,
    capturePath: parsed.CAPTURE_PATH ?? defaultCapturePath(),
    frameIntervalMs: parsed.FRAME_INTERVAL_MS,
    bypassMode: parsed.BYPASS_MODE,
    maxQueuedBytes: parsed.MAX_QUEUED_BYTES,
    ...(parsed.RELAY_PASSWORD !== undefined && { password: parsed.RELAY_PASSWORD }),
  };
}
