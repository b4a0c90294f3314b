import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { readSecret } from '../secrets.js';

describe('readSecret', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'secrets-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prefers the mounted file, trimmed', async () => {
    await writeFile(join(dir, 'postgres_password'), 'test-secret\n');

    expect(readSecret('postgres_password', 'POSTGRES_PASSWORD', { dir, env: { POSTGRES_PASSWORD: 'from-env' } }))
      .toBe('test-secret');
  });

  it('falls back to the environment', () => {
    expect(readSecret('postgres_password', 'POSTGRES_PASSWORD', { dir, env: { POSTGRES_PASSWORD: 'from-env' } }))
      .toBe('from-env');
  });

  it('treats an empty variable as unset', () => {
    expect(readSecret('redis_password', 'REDIS_PASSWORD', { dir, env: { REDIS_PASSWORD: '' } })).toBeUndefined();
  });

  it('throws for an unreadable mount without a fallback', async () => {
    await mkdir(join(dir, 'redis_password'));

    expect(() => readSecret('redis_password', 'REDIS_PASSWORD', { dir, env: {} }))
      .toThrow(`Secret "redis_password" is mounted at ${join(dir, 'redis_password')} but unreadable`);
    expect(readSecret('redis_password', 'REDIS_PASSWORD', { dir, env: { REDIS_PASSWORD: 'test-secret' } }))
      .toBe('test-secret');
  });
});
