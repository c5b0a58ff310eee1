import { existsSync } from 'node:fs';
import { resolve } from 'node:path';

export const RUNTIME_SETTINGS = Symbol('RUNTIME_SETTINGS');

export interface RuntimeSettings {
  port: number;
  seedSampleData: boolean;
  sampleDataOwner: string;
}

const ENV_FILE_CANDIDATES = [
  resolve(process.cwd(), '.env'),
  resolve(__dirname, '..', '.env'),
];

const DEFAULT_PORT = 3000;
const DEFAULT_SAMPLE_DATA_OWNER = 'workshop';

let envLoadAttempted = false;

export function ensureRuntimeEnvLoaded(): void {
  if (envLoadAttempted) {
    return;
  }

  envLoadAttempted = true;

  const envFilePath = ENV_FILE_CANDIDATES.find((candidate) =>
    existsSync(candidate),
  );
  if (envFilePath) {
    process.loadEnvFile(envFilePath);
  }
}

export function readRuntimeSettings(
  env: NodeJS.ProcessEnv = process.env,
): RuntimeSettings {
  const parsedPort = Number.parseInt(env.PORT ?? '', 10);

  return {
    port: Number.isNaN(parsedPort) ? DEFAULT_PORT : parsedPort,
    seedSampleData: env.SEED_SAMPLE_DATA?.trim().toLowerCase() !== 'false',
    sampleDataOwner:
      env.SAMPLE_DATA_OWNER?.trim() || DEFAULT_SAMPLE_DATA_OWNER,
  };
}
