import { describe, expect, it } from 'vitest';

import { parseArgs } from '../../api/cli/args';

describe('parseArgs', () => {
  it('splits positionals from valued flags', () => {
    expect(parseArgs(['chat.txt', '--mode', 'frequency'])).toEqual({
      positional: ['chat.txt'],
      flags: { mode: 'frequency' },
    });
  });

  it('never gives a boolean flag the following argument', () => {
    expect(parseArgs(['--json', 'chat.txt'], ['json'])).toEqual({
      positional: ['chat.txt'],
      flags: { json: 'true' },
    });
  });

  it('treats a flag followed by another flag as set', () => {
    expect(parseArgs(['--verbose', '--markers', 'm.json']).flags).toEqual({ verbose: 'true', markers: 'm.json' });
  });
});
