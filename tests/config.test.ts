import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { fileURLToPath } from 'url';
import {
  loadCatalogConfig,
  loadConfig,
  loadConsolidationConfig,
  loadGateRunConfig,
  loadSelectionConfig,
  validateConfig,
} from '../src/core/config.js';
import {
  makeConsolidationConfig,
  makeGateRunConfig,
  makeSelectionConfig,
} from './fixtures.js';

const REPO_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const ENV_KEYS = [
  'OBLIGATIONS_DIR',
  'PACKS_DIR',
  'DATA_DIR',
  'SELECTION_THRESHOLD',
  'SELECTION_DEFAULT_PACK',
  'SIGNAL_OBLIGATION_WEIGHT',
  'SIGNAL_FULL_CREDIT_MATCHES',
  'SIGNAL_DECAY',
  'PROPOSAL_MIN_EVIDENCE',
  'GATE_CHECK_TIMEOUT_MS',
  'GATE_STRICT',
  'GATE_PRIVILEGED',
  'GATE_CAPABILITIES',
];

describe('config loading', () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      if (saved[key] === undefined) delete process.env[key];
      else process.env[key] = saved[key];
    }
  });

  it('resolves catalog directories against the repository root', () => {
    const catalog = loadCatalogConfig();
    expect(catalog.obligationsDir).toBe(path.join(REPO_ROOT, 'obligations'));
    expect(catalog.packsDir).toBe(path.join(REPO_ROOT, 'packs'));
    expect(catalog.dataDir).toBe(path.join(REPO_ROOT, 'data'));
  });

  it('honors directory overrides', () => {
    process.env.DATA_DIR = '/tmp/gate-data';
    expect(loadCatalogConfig().dataDir).toBe('/tmp/gate-data');
  });

  it('uses selection defaults', () => {
    expect(loadSelectionConfig()).toEqual(makeSelectionConfig());
  });

  it('reads selection overrides', () => {
    process.env.SELECTION_THRESHOLD = '0.75';
    process.env.SELECTION_DEFAULT_PACK = ' fault-injection-io ';
    process.env.SIGNAL_FULL_CREDIT_MATCHES = '2';
    const selection = loadSelectionConfig();
    expect(selection.threshold).toBe(0.75);
    expect(selection.defaultPackId).toBe('fault-injection-io');
    expect(selection.fullCreditMatches).toBe(2);
  });

  it('falls back on unparseable numbers', () => {
    process.env.SELECTION_THRESHOLD = 'abc';
    process.env.SIGNAL_FULL_CREDIT_MATCHES = '2.5';
    process.env.PROPOSAL_MIN_EVIDENCE = '';
    expect(loadSelectionConfig().threshold).toBe(0.5);
    expect(loadSelectionConfig().fullCreditMatches).toBe(3);
    expect(loadConsolidationConfig()).toEqual(makeConsolidationConfig());
  });

  it('parses gate settings', () => {
    process.env.GATE_CHECK_TIMEOUT_MS = '0';
    process.env.GATE_STRICT = 'yes';
    process.env.GATE_PRIVILEGED = 'off';
    process.env.GATE_CAPABILITIES = ' Prometheus, http_client ,,';
    expect(loadGateRunConfig()).toEqual({
      checkTimeoutMs: 1,
      strict: true,
      privileged: false,
      capabilities: ['prometheus', 'http_client'],
    });
  });

  it('keeps boolean defaults for unknown words', () => {
    process.env.GATE_STRICT = 'maybe';
    expect(loadGateRunConfig().strict).toBe(false);
  });

  it('loadConfig() validates what it loads', () => {
    process.env.SIGNAL_OBLIGATION_WEIGHT = '1.5';
    expect(() => loadConfig()).toThrow(/SIGNAL_OBLIGATION_WEIGHT must be in \(0, 1\]/);
  });
});

describe('validateConfig', () => {
  const base = () => ({
    catalog: { obligationsDir: '/o', packsDir: '/p', dataDir: '/d' },
    selection: makeSelectionConfig(),
    consolidation: makeConsolidationConfig(),
    gate: makeGateRunConfig(),
  });

  it('accepts defaults', () => {
    expect(() => validateConfig(base())).not.toThrow();
  });

  it('collects every problem in one error', () => {
    const config = base();
    config.selection = makeSelectionConfig({ threshold: 0, decay: 2 });
    config.consolidation = makeConsolidationConfig({ proposalMinEvidence: -1 });

    expect(() => validateConfig(config)).toThrow(
      'Invalid configuration:\n' +
        '  - SELECTION_THRESHOLD must be > 0\n' +
        '  - SIGNAL_DECAY must be between 0 and 1\n' +
        '  - PROPOSAL_MIN_EVIDENCE must be non-negative',
    );
  });

  it('rejects an empty default pack', () => {
    const config = base();
    config.selection = makeSelectionConfig({ defaultPackId: '' });
    expect(() => validateConfig(config)).toThrow(/SELECTION_DEFAULT_PACK/);
  });
});
