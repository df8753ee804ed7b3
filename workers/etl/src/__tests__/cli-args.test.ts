import { describe, it, expect } from 'vitest';
import { parseCliArgs } from '../cli-args';

describe('parseCliArgs', () => {
  it('parses a database run', () => {
    expect(parseCliArgs(['run'])).toEqual({ command: 'run', fixture: null });
  });

  it('parses a dry run on a fixture', () => {
    expect(parseCliArgs(['run', '--fixture', 'fixtures/sample-shops.json'])).toEqual({
      command: 'run',
      fixture: 'fixtures/sample-shops.json',
    });
  });

  it('parses enqueue', () => {
    expect(parseCliArgs(['enqueue'])).toEqual({ command: 'enqueue' });
  });

  it('rejects --fixture without a path', () => {
    expect(() => parseCliArgs(['run', '--fixture'])).toThrow('--fixture needs a path to a JSON dataset');
    expect(() => parseCliArgs(['run', '--fixture', '--verbose'])).toThrow(
      '--fixture needs a path to a JSON dataset',
    );
  });

  it('rejects unknown and missing commands', () => {
    expect(() => parseCliArgs(['migrate'])).toThrow('Unknown command: migrate');
    expect(() => parseCliArgs([])).toThrow('Missing command');
  });
});
