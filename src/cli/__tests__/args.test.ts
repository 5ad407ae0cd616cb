import { describe, it, expect } from 'vitest';
import { parseArgs } from '../args.js';

describe('parseArgs', () => {
  it('defaults to a registering run', () => {
    expect(parseArgs([])).toEqual({ name: 'run', register: true, replaceExisting: false });
    expect(parseArgs(['run'])).toEqual({ name: 'run', register: true, replaceExisting: false });
  });

  it('reads run flags', () => {
    expect(parseArgs(['run', '--no-register', '--replace'])).toEqual({ name: 'run', register: false, replaceExisting: true });
  });

  it('registers a document', () => {
    expect(parseArgs(['register', 'out/kpis.json', '--replace'])).toEqual({
      name: 'register',
      file: 'out/kpis.json',
      replaceExisting: true,
    });
  });

  it('reads a registration limit', () => {
    expect(parseArgs(['register', 'kpis.json', '--limit', '5'])).toEqual({
      name: 'register',
      file: 'kpis.json',
      replaceExisting: false,
      limit: 5,
    });
    expect(parseArgs(['register', '--limit=2', 'kpis.json'])).toEqual({
      name: 'register',
      file: 'kpis.json',
      replaceExisting: false,
      limit: 2,
    });
  });

  it('asks for help', () => {
    expect(parseArgs(['--help'])).toEqual({ name: 'help', invalid: false });
    expect(parseArgs(['run', '--help', '--bogus'])).toEqual({ name: 'help', invalid: false });
  });

  it.each([
    [['--bogus']],
    [['register']],
    [['register', 'a.json', 'b.json']],
    [['run', 'extra']],
    [['deploy']],
    [['register', 'a.json', '--limit', '0']],
    [['register', 'a.json', '--limit']],
    [['run', '--limit', '3']],
  ])(
    'rejects %j',
    argv => {
      expect(parseArgs(argv)).toEqual({ name: 'help', invalid: true });
    }
  );
});
