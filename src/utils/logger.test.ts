import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, getLogger, setDebugLogging } from './logger.js';

describe('Logger', () => {
  let capturedOutput: string[] = [];
  let originalWrite: typeof process.stderr.write;

  beforeEach(() => {
    capturedOutput = [];
    originalWrite = process.stderr.write.bind(process.stderr);
    process.stderr.write = vi.fn((chunk: string | Uint8Array): boolean => {
      capturedOutput.push(typeof chunk === 'string' ? chunk : new TextDecoder().decode(chunk));
      return true;
    }) as typeof process.stderr.write;
  });

  afterEach(() => {
    process.stderr.write = originalWrite;
    setDebugLogging(false);
  });

  function parseOutput(index: number): Record<string, unknown> {
    const output = capturedOutput[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim()) as Record<string, unknown>;
  }

  it('writes one JSON line per entry with component and event', () => {
    const logger = new Logger({ component: 'FeatureEngine' });

    logger.info('feature_created', { slug: 'mea-otp-checkout-recovery' });

    expect(capturedOutput).toHaveLength(1);
    expect(capturedOutput[0]?.endsWith('\n')).toBe(true);
    const parsed = parseOutput(0);
    expect(parsed.level).toBe('info');
    expect(parsed.component).toBe('FeatureEngine');
    expect(parsed.event).toBe('feature_created');
    expect(parsed.data).toEqual({ slug: 'mea-otp-checkout-recovery' });
    expect(typeof parsed.timestamp).toBe('string');
  });

  it('omits the data field when no data is given', () => {
    const logger = new Logger({ component: 'Store' });

    logger.warn('empty');

    expect(parseOutput(0)).not.toHaveProperty('data');
  });

  it('suppresses debug entries unless debug mode is on', () => {
    const quiet = new Logger({ component: 'Quiet' });
    const loud = new Logger({ component: 'Loud', debugMode: true });

    quiet.debug('hidden');
    loud.debug('shown');

    expect(capturedOutput).toHaveLength(1);
    expect(parseOutput(0).event).toBe('shown');
  });

  it('falls back to a serialization error entry for circular data', () => {
    const logger = new Logger({ component: 'TestLogger' });
    const circular: Record<string, unknown> = { name: 'test' };
    circular.self = circular;

    expect(() => {
      logger.error('circular_test', circular);
    }).not.toThrow();

    const parsed = parseOutput(0);
    expect(parsed.event).toBe('circular_test');
    expect(typeof parsed.serializationError).toBe('string');
    expect(parsed.originalData).toBe('[unserializable]');
  });

  it('shares one logger per component and follows the global debug switch', () => {
    const first = getLogger('SharedComponent');
    const second = getLogger('SharedComponent');
    expect(first).toBe(second);

    first.debug('before');
    setDebugLogging(true);
    first.debug('after');

    expect(capturedOutput).toHaveLength(1);
    expect(parseOutput(0).event).toBe('after');
  });
});
