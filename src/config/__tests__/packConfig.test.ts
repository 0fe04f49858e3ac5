import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { assertPackName, loadPackConfig, parsePackConfig, resolveGateConfig, type PackConfig } from '../packConfig';
import { loadConfig } from '..';
import { ConfigError } from '../../core/gate/errors';
import { defaultBrandTokens } from '../../core/refine/parameters';

const RAW = {
  theme: 'neon city',
  prompts: {
    starting: 'Starting soon screen, {theme}',
    brb: 'Be right back screen, {theme}',
  },
  brand: { mood: 'calm', primary_colors: ['#123456'] },
};

describe('assertPackName', () => {
  it('should accept letters, digits, dashes and underscores', () => {
    expect(() => assertPackName('neon_cyberpunk-2')).not.toThrow();
  });

  it.each(['', '../etc', 'a b', '_hidden'])('should reject %j', (name) => {
    expect(() => assertPackName(name)).toThrow(ConfigError);
  });
});

describe('parsePackConfig', () => {
  it('should derive categories from the prompts and fill brand defaults from the theme', () => {
    const cfg = parsePackConfig(RAW, 'neon', '/packs/neon');
    const d = defaultBrandTokens('neon city');

    expect(cfg.categories).toEqual(['starting', 'brb']);
    expect(cfg.parameters.brand).toEqual({ ...d, mood: 'calm', primary_colors: ['#123456'] });
    expect(cfg.threshold).toBeNull();
    expect(cfg.maxRounds).toBeNull();
    expect(cfg.dir).toBe('/packs/neon');
  });

  it('should reject a pack without prompts', () => {
    expect(() => parsePackConfig({ ...RAW, prompts: {} }, 'neon', '/packs/neon')).toThrow(
      'pack "neon" config rejected (prompts: at least one category prompt is required)'
    );
  });

  it('should reject malformed colors', () => {
    expect(() =>
      parsePackConfig({ ...RAW, brand: { primary_colors: ['magenta'] } }, 'neon', '/packs/neon')
    ).toThrow(/^pack "neon" config rejected \(brand\.primary_colors\.0: /);
  });

  it('should reject a threshold outside 0..10', () => {
    expect(() => parsePackConfig({ ...RAW, threshold: 12 }, 'neon', '/packs/neon')).toThrow(ConfigError);
  });
});

describe('loadPackConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'pack-qa-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should read pack.json from the pack directory', async () => {
    await mkdir(join(root, 'neon'));
    await writeFile(join(root, 'neon', 'pack.json'), JSON.stringify({ ...RAW, maxRounds: 4 }));

    const cfg = await loadPackConfig(root, 'neon');

    expect(cfg.name).toBe('neon');
    expect(cfg.dir).toBe(join(root, 'neon'));
    expect(cfg.maxRounds).toBe(4);
  });

  it('should report a missing file as a ConfigError', async () => {
    await expect(loadPackConfig(root, 'missing')).rejects.toThrow(
      `cannot read ${join(root, 'missing', 'pack.json')}: `
    );
  });

  it('should report invalid JSON as a ConfigError', async () => {
    await mkdir(join(root, 'neon'));
    await writeFile(join(root, 'neon', 'pack.json'), '{ theme: ');

    await expect(loadPackConfig(root, 'neon')).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('resolveGateConfig', () => {
  const pack: PackConfig = parsePackConfig({ ...RAW, threshold: 9 }, 'neon', '/packs/neon');
  const app = loadConfig({ QA_THRESHOLD: '7', QA_MAX_ROUNDS: '6', QA_RETRIES: '2' });

  it('should prefer pack.json over the environment', () => {
    expect(resolveGateConfig(app, pack)).toEqual({
      threshold: 9,
      maxRounds: 6,
      categories: ['starting', 'brb'],
      callTimeoutMs: 120_000,
      retries: 2,
      backoffMs: 500,
    });
  });

  it('should prefer command-line overrides over pack.json', () => {
    const cfg = resolveGateConfig(app, pack, { threshold: 8, maxRounds: 2 });

    expect(cfg.threshold).toBe(8);
    expect(cfg.maxRounds).toBe(2);
  });
});
