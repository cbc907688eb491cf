import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { DEFAULT_CONFIG, getConfig, getServerPort, loadConfig, resetConfig } from '../config.js';

const { describe, it, beforeEach, afterEach } = test;

describe('loadConfig', () => {
  let tempDir: string;
  const savedEnv = { EPI_CONFIG: process.env.EPI_CONFIG, PORT: process.env.PORT };

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'epi-config-test-'));
    delete process.env.EPI_CONFIG;
    delete process.env.PORT;
    resetConfig();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    for (const [key, value] of Object.entries(savedEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetConfig();
  });

  it('should fall back to defaults when the file is missing', async () => {
    const config = await loadConfig(tempDir);
    assert.deepStrictEqual(config, DEFAULT_CONFIG);
    assert.deepStrictEqual(getConfig(), DEFAULT_CONFIG);
  });

  it('should merge valid values over the defaults', async () => {
    fs.writeFileSync(path.join(tempDir, 'config.default.json'), JSON.stringify({
      port: 5000,
      maxSectionDepth: 8,
      jsonLimit: 3,
    }));

    const config = await loadConfig(tempDir);
    assert.deepStrictEqual(config, {
      port: 5000,
      maxSectionDepth: 8,
      untitledSectionTitle: 'Untitled Section',
      jsonLimit: '5mb',
    });
  });

  it('should pick the file named by EPI_CONFIG', async () => {
    process.env.EPI_CONFIG = 'test';
    fs.writeFileSync(path.join(tempDir, 'config.test.json'), JSON.stringify({ untitledSectionTitle: '(untitled)' }));

    const config = await loadConfig(tempDir);
    assert.strictEqual(config.untitledSectionTitle, '(untitled)');
  });

  it('should let PORT override the configured port', async () => {
    await loadConfig(tempDir);
    assert.strictEqual(getServerPort(), 4000);
    process.env.PORT = '4321';
    assert.strictEqual(getServerPort(), 4321);
  });
});
