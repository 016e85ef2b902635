// src/core/config/credentials.ts
import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { z } from 'zod';
import { ErrorCode, ScrapeError } from '../errors.js';

const CredentialsSchema = z.object({
  apiId: z.coerce.number().int().positive(),
  apiHash: z.string().min(1),
  session: z.string().min(1),
});

export type PlatformCredentials = z.infer<typeof CredentialsSchema>;

export interface CredentialSources {
  env?: NodeJS.ProcessEnv;
  filePath: string;
}

/**
 * Resolves platform credentials from `TG_API_ID`, `TG_API_HASH` and
 * `TG_SESSION`, falling back to a JSON file. The session string must come
 * from an account that is already authorised.
 */
export async function loadCredentials(sources: CredentialSources): Promise<PlatformCredentials> {
  const env = sources.env ?? process.env;

  if (env.TG_API_ID || env.TG_API_HASH || env.TG_SESSION) {
    return parseCredentials(
      { apiId: env.TG_API_ID, apiHash: env.TG_API_HASH, session: env.TG_SESSION },
      'environment'
    );
  }

  if (!existsSync(sources.filePath)) {
    throw new ScrapeError(
      ErrorCode.INVALID_CONFIG,
      `Credentials not found: ${sources.filePath}`,
      'Set TG_API_ID, TG_API_HASH and TG_SESSION, or pass --credentials <path>'
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(sources.filePath, 'utf-8'));
  } catch (error) {
    throw new ScrapeError(
      ErrorCode.INVALID_CONFIG,
      `Cannot read credentials file ${sources.filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseCredentials(raw, sources.filePath);
}

function parseCredentials(raw: unknown, origin: string): PlatformCredentials {
  const parsed = CredentialsSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
    throw new ScrapeError(
      ErrorCode.INVALID_CONFIG,
      `Invalid credentials in ${origin}: ${fields}`,
      'Expected apiId (number), apiHash and session (non-empty strings)'
    );
  }
  return parsed.data;
}
