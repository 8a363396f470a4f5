import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { parseDevsQueryArgs } from './devs-query-args.js';
import { UsageError } from '../utils/errors.js';

describe('parseDevsQueryArgs', () => {
  it('queries connected serial interfaces by default', () => {
    expect(parseDevsQueryArgs(['uid'])).toEqual({
      field: 'uid',
      filters: [],
      devsYml: null,
      includeNotConnected: false,
      help: false,
    });
  });

  it('collects filters from repeated and combined flags', () => {
    const args = parseDevsQueryArgs(['address', '-f', 'name=board-a hub=1-1', '--filter', 'port=2', '-y', 'devs.yml']);

    expect(args.filters).toEqual([
      { field: 'name', value: 'board-a' },
      { field: 'hub', value: '1-1' },
      { field: 'port', value: '2' },
    ]);
    expect(args.devsYml).toBe(path.resolve('devs.yml'));
  });

  it('includes registry devices that are not connected on request', () => {
    expect(parseDevsQueryArgs(['name', '-y', 'devs.yml', '--not-connected']).includeNotConnected).toBe(true);
  });

  it('rejects unknown fields before loading anything', () => {
    expect(() => parseDevsQueryArgs(['serial'])).toThrow(UsageError);
    expect(() => parseDevsQueryArgs(['uid', '-f', 'color=red'])).toThrow(UsageError);
    expect(() => parseDevsQueryArgs(['uid', '-f', 'name'])).toThrow("Filter must be in format 'attribute=value'");
  });

  it('needs exactly one field', () => {
    expect(() => parseDevsQueryArgs([])).toThrow('exactly one field to query is required');
    expect(() => parseDevsQueryArgs(['uid', 'name'])).toThrow(UsageError);
  });
});
