import { existsSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigValidationError } from '../config/index.js';
import { setDebugLogging } from '../utils/logger.js';
import { createCliApp, getDisplayOptions } from './app.js';
import { parseArgs } from './args.js';

describe('createCliApp', () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'feature-cli-'));
    configPath = join(dir, 'config.yaml');
    writeFileSync(
      configPath,
      `paths:\n  features: ${join(dir, 'features')}\nproducts:\n  meal-kit:\n    name: Meal Kit\n`
    );
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    setDebugLogging(false);
  });

  it('stores features under the configured directory', () => {
    const context = createCliApp(parseArgs(['list', '-c', configPath]).options, {});

    const result = context.engine.startFeature({ title: 'Pantry Sync', productId: 'meal-kit' });

    expect(result.kind).toBe('created');
    expect(existsSync(join(dir, 'features', 'mea-pantry-sync.json'))).toBe(true);
  });

  it('takes the actor from --actor, then USER, then the default', () => {
    const withActor = parseArgs(['list', '-c', configPath, '--actor', 'dave']).options;
    const withoutActor = parseArgs(['list', '-c', configPath]).options;

    expect(createCliApp(withActor, { USER: 'carol' }).actor).toBe('dave');
    expect(createCliApp(withoutActor, { USER: 'carol' }).actor).toBe('carol');
    expect(createCliApp(withoutActor, {}).actor).toBe('system');
  });

  it('fails on an invalid effective configuration', () => {
    const options = parseArgs(['list', '-c', configPath]).options;

    expect(() =>
      createCliApp(options, { FEATURE_ENGINE_GATES_CONTEXT_APPROVED_THRESHOLD: '30' })
    ).toThrow(ConfigValidationError);
  });
});

describe('getDisplayOptions', () => {
  it('turns colors off under NO_COLOR', () => {
    expect(getDisplayOptions({ NO_COLOR: '1' })).toEqual({ colors: false, unicode: true });
  });
});
