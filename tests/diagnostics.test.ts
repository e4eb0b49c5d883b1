import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { environmentChecks } from '../src/cli/diagnostics.js';

describe('environmentChecks', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'verisql-doctor-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('passes with a .env file on a supported Node.js', async () => {
    await writeFile(join(dir, '.env'), 'LOG_LEVEL=INFO\n');

    expect(environmentChecks(dir, 'v20.11.0')).toEqual([
      { name: 'Environment File', passed: true, message: '.env file found', fix: undefined },
      { name: 'Node.js Version', passed: true, message: 'Node v20.11.0', fix: undefined },
    ]);
  });

  it('suggests fixes when the file is missing and Node.js is too old', () => {
    const [envFile, node] = environmentChecks(dir, 'v18.0.0');

    expect(envFile).toMatchObject({
      passed: false,
      message: '.env file not found (using process environment)',
      fix: 'Copy .env.example to .env and fill it in',
    });
    expect(node).toMatchObject({ passed: false, fix: 'Upgrade to Node.js 20 or higher' });
  });
});
