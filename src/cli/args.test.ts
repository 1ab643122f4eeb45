import { describe, expect, it } from 'vitest';
import { ArgumentError, parseArgs } from './args.js';

describe('parseArgs', () => {
  it('separates the command, positionals and options', () => {
    const parsed = parseArgs([
      'start',
      'OTP',
      'Checkout',
      '--product',
      'meal-kit',
      'Recovery',
      '--confirm',
    ]);

    expect(parsed).toEqual({
      command: 'start',
      positionals: ['OTP', 'Checkout', 'Recovery'],
      options: { product: 'meal-kit', force: false, confirm: true, json: false, help: false },
    });
  });

  it('accepts short names and inline values', () => {
    const parsed = parseArgs(['list', '-p', 'meal-kit', '--config=ops/config.yaml', '-c', 'x.yaml']);

    expect(parsed.options.product).toBe('meal-kit');
    expect(parsed.options.config).toBe('x.yaml');
  });

  it('keeps JSON payloads intact', () => {
    const parsed = parseArgs([
      'track',
      'mea-otp',
      'context',
      'submit_version',
      '--payload={"version":1,"score":40}',
    ]);

    expect(parsed.options.payload).toBe('{"version":1,"score":40}');
  });

  it('treats everything after -- as positionals', () => {
    const parsed = parseArgs(['reject', 'mea-otp', '--', '--force', 'is', 'not', 'a', 'flag']);

    expect(parsed.positionals).toEqual(['mea-otp', '--force', 'is', 'not', 'a', 'flag']);
    expect(parsed.options.force).toBe(false);
  });

  it('returns an empty command for no arguments', () => {
    expect(parseArgs([]).command).toBe('');
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseArgs(['list', '--verbose'])).toThrow(new ArgumentError('Unknown option: --verbose'));
    expect(() => parseArgs(['start', 'OTP', '--product'])).toThrow(
      'Option --product requires a value'
    );
    expect(() => parseArgs(['approve', '--force=yes'])).toThrow(
      'Option --force does not take a value'
    );
  });
});
