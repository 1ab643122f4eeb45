import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, FeatureEngine, MemoryFeatureStore, VERSION } from './index.js';

describe('Feature Lifecycle Engine', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  it('should expose a working engine from the package root', () => {
    const engine = new FeatureEngine({ config: DEFAULT_CONFIG, store: new MemoryFeatureStore() });

    const result = engine.startFeature({ title: 'Gift Cards', productId: 'pantry' });

    expect(result.kind).toBe('created');
    expect(engine.listFeatures().map((feature) => feature.slug)).toEqual(['pan-gift-cards']);
  });
});
