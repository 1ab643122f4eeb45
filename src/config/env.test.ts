import { describe, expect, it, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  getEnvVarDocumentation,
} from './env.js';
import { ConfigValidationError, DEFAULT_CONFIG, loadConfig, parseConfig } from './index.js';

describe('Environment Variable Overrides', () => {
  describe('readEnvOverrides', () => {
    it('should read string, number, boolean and list variables', () => {
      const result = readEnvOverrides({
        FEATURE_ENGINE_PATHS_FEATURES: '/srv/features',
        FEATURE_ENGINE_GATES_CONTEXT_REVIEW_THRESHOLD: ' 70 ',
        FEATURE_ENGINE_GATES_FIGMA_REQUIRED: 'off',
        FEATURE_ENGINE_GATES_REQUIRED_BC_APPROVERS: 'Dave Manager, Jack Approver,',
      });

      expect(result.overrides).toEqual({
        paths: { features: '/srv/features' },
        gates: {
          context_review_threshold: 70,
          figma_required: false,
          required_bc_approvers: ['Dave Manager', 'Jack Approver'],
        },
      });
      expect(result.appliedVars).toEqual([
        'FEATURE_ENGINE_PATHS_FEATURES',
        'FEATURE_ENGINE_GATES_CONTEXT_REVIEW_THRESHOLD',
        'FEATURE_ENGINE_GATES_FIGMA_REQUIRED',
        'FEATURE_ENGINE_GATES_REQUIRED_BC_APPROVERS',
      ]);
    });

    it('should ignore unset, empty and unrelated variables', () => {
      const result = readEnvOverrides({
        FEATURE_ENGINE_LOGGING_DEBUG: '',
        FEATURE_ENGINE_UNKNOWN: 'x',
        HOME: '/home/test',
      });

      expect(result.overrides).toEqual({});
      expect(result.appliedVars).toEqual([]);
    });

    it('should accept the debug shortcut', () => {
      expect(readEnvOverrides({ FEATURE_ENGINE_DEBUG: 'YES' }).overrides.logging).toEqual({
        debug: true,
      });
    });

    it('should throw EnvCoercionError for invalid numbers', () => {
      expect(() =>
        readEnvOverrides({ FEATURE_ENGINE_ALIASES_SIMILARITY_THRESHOLD: 'high' })
      ).toThrow(EnvCoercionError);
    });

    it('should collect coercion errors when asked to', () => {
      const result = readEnvOverrides(
        {
          FEATURE_ENGINE_GATES_FIGMA_REQUIRED: 'maybe',
          FEATURE_ENGINE_LOGGING_DEBUG: 'true',
        },
        { collectErrors: true }
      );

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.envVar).toBe('FEATURE_ENGINE_GATES_FIGMA_REQUIRED');
      expect(result.errors[0]?.expectedType).toBe('boolean');
      expect(result.appliedVars).toEqual(['FEATURE_ENGINE_LOGGING_DEBUG']);
    });
  });

  describe('applyEnvOverrides', () => {
    it('should override file values and product gates', () => {
      const config = parseConfig(`
gates:
  figma_required: true
products:
  meal-kit:
    gates:
      context_review_threshold: 65
`);
      const result = applyEnvOverrides(config, { FEATURE_ENGINE_GATES_FIGMA_REQUIRED: 'false' });

      expect(result.gates.figma_required).toBe(false);
      expect(result.products['meal-kit']?.gates.figma_required).toBe(false);
      expect(result.products['meal-kit']?.gates.context_review_threshold).toBe(65);
      expect(config.gates.figma_required).toBe(true);
    });

    it('should return an equal config when no variables are set', () => {
      expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'config-env-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('should apply env > file > defaults precedence', () => {
      const file = join(dir, 'config.yaml');
      writeFileSync(file, 'gates:\n  context_review_threshold: 65\n  context_approved_threshold: 90\n');

      const config = loadConfig(file, { FEATURE_ENGINE_GATES_CONTEXT_APPROVED_THRESHOLD: '95' });

      expect(config.gates.context_review_threshold).toBe(65);
      expect(config.gates.context_approved_threshold).toBe(95);
      expect(config.gates.context_draft_threshold).toBe(0);
    });

    it('should validate the effective configuration', () => {
      expect(() =>
        loadConfig(join(dir, 'missing.yaml'), {
          FEATURE_ENGINE_GATES_CONTEXT_APPROVED_THRESHOLD: '30',
        })
      ).toThrow(ConfigValidationError);
    });
  });

  describe('getEnvVarDocumentation', () => {
    it('should document every supported variable', () => {
      const docs = getEnvVarDocumentation();
      expect(Object.keys(docs)).toContain('FEATURE_ENGINE_PATHS_FEATURES');
      expect(docs.FEATURE_ENGINE_DEBUG?.type).toBe('boolean');
      expect(docs.FEATURE_ENGINE_GATES_REQUIRED_BC_APPROVERS?.type).toBe('list');
    });
  });
});
