import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { loadConfig } from '../../../src/config/ConfigLoader.js';

describe('ConfigLoader', () => {
  const tmpDir = path.join(os.tmpdir(), 'postindex-config-' + Date.now());

  beforeEach(() => {
    fs.mkdirSync(tmpDir, { recursive: true });
    delete process.env.POSTINDEX_CONTENT_ROOT;
    delete process.env.POSTINDEX_LOG_LEVEL;
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    delete process.env.POSTINDEX_CONTENT_ROOT;
    delete process.env.POSTINDEX_LOG_LEVEL;
  });

  it('should return default config when no file exists', () => {
    const config = loadConfig('/nonexistent/path');
    expect(config.content.root).toBe('.');
    expect(config.content.postsDir).toBe('_posts');
    expect(config.content.extensions).toEqual(['.md', '.markdown']);
    expect(config.output.indexPath).toBe('_data/navigation.json');
    expect(config.log.level).toBe('info');
  });

  it('should merge the config file, then overrides, over defaults', () => {
    fs.writeFileSync(
      path.join(tmpDir, '.postindex.json'),
      JSON.stringify({ content: { root: 'src', exclude: ['drafts'] }, log: { level: 'warn' } }),
    );

    const config = loadConfig(tmpDir, { log: { level: 'debug' } });
    expect(config.content.root).toBe('src');
    expect(config.content.exclude).toEqual(['drafts']);
    // 其他欄位仍用 defaults
    expect(config.content.postsDir).toBe('_posts');
    expect(config.log.level).toBe('debug');
  });

  it('should let environment variables win', () => {
    process.env.POSTINDEX_CONTENT_ROOT = 'content';
    process.env.POSTINDEX_LOG_LEVEL = 'error';
    const config = loadConfig('/nonexistent/path', { content: { root: 'ignored' } });
    expect(config.content.root).toBe('content');
    expect(config.log.level).toBe('error');
  });

  it('should reject an unknown log level from the environment', () => {
    process.env.POSTINDEX_LOG_LEVEL = 'verbose';
    expect(() => loadConfig('/nonexistent/path')).toThrow(
      'POSTINDEX_LOG_LEVEL must be one of debug, info, warn, error (got "verbose")',
    );
  });

  it('should reject unknown keys in the config file', () => {
    fs.writeFileSync(path.join(tmpDir, '.postindex.json'), JSON.stringify({ content: { rooot: 'x' } }));
    expect(() => loadConfig(tmpDir)).toThrow(/^Invalid \.postindex\.json: content: Unrecognized key/);
  });

  it('should reject a config file that is not JSON', () => {
    fs.writeFileSync(path.join(tmpDir, '.postindex.json'), '{ content: ');
    expect(() => loadConfig(tmpDir)).toThrow('.postindex.json is not valid JSON');
  });

  it('should validate extensions', () => {
    expect(() => loadConfig('/nonexistent', { content: { extensions: [] } })).toThrow(
      'content.extensions must not be empty',
    );
    expect(() => loadConfig('/nonexistent', { content: { extensions: ['md'] } })).toThrow(
      'content.extensions entries must look like ".md" (got "md")',
    );
  });

  it('should validate the config version', () => {
    expect(() => loadConfig('/nonexistent', { version: 2 })).toThrow('unsupported config version 2');
  });
});
