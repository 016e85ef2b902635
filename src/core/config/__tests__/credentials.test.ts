import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadCredentials } from '../credentials.js';
import { ErrorCode } from '../../errors.js';

describe('loadCredentials', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'credentials-'));
    filePath = path.join(tmpDir, 'credentials.json');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('prefers the environment over the file', async () => {
    await fs.writeFile(filePath, JSON.stringify({ apiId: 1, apiHash: 'file-hash', session: 'file-session' }));

    const credentials = await loadCredentials({
      env: { TG_API_ID: '12345', TG_API_HASH: 'test-hash', TG_SESSION: 'test-session' },
      filePath,
    });

    expect(credentials).toEqual({ apiId: 12345, apiHash: 'test-hash', session: 'test-session' });
  });

  it('names the missing fields of an incomplete environment', async () => {
    await expect(
      loadCredentials({ env: { TG_API_ID: '12345', TG_API_HASH: 'test-hash' }, filePath })
    ).rejects.toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      message: 'Invalid credentials in environment: session',
    });
  });

  it('reads the credentials file', async () => {
    await fs.writeFile(filePath, JSON.stringify({ apiId: 777, apiHash: 'test-hash', session: 'test-session' }));

    await expect(loadCredentials({ env: {}, filePath })).resolves.toEqual({
      apiId: 777,
      apiHash: 'test-hash',
      session: 'test-session',
    });
  });

  it('reports a missing file', async () => {
    await expect(loadCredentials({ env: {}, filePath })).rejects.toMatchObject({
      code: ErrorCode.INVALID_CONFIG,
      message: `Credentials not found: ${filePath}`,
    });
  });

  it('reports a file that is not JSON', async () => {
    await fs.writeFile(filePath, 'apiId=1');

    const error = await loadCredentials({ env: {}, filePath }).catch((e: unknown) => e);

    expect(error).toMatchObject({ code: ErrorCode.INVALID_CONFIG });
    expect(String(error)).toContain(`Cannot read credentials file ${filePath}`);
  });

  it('rejects a non-numeric api id', async () => {
    await fs.writeFile(filePath, JSON.stringify({ apiId: 'abc', apiHash: 'test-hash', session: 'test-session' }));

    await expect(loadCredentials({ env: {}, filePath })).rejects.toMatchObject({
      message: `Invalid credentials in ${filePath}: apiId`,
    });
  });
});
