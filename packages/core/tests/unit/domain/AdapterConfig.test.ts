import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ConfigurationError } from '../../../src/domain/errors/DataPortErrors.js';
import { compactOptions, parseAdapterConfig } from '../../../src/domain/services/AdapterConfig.js';

const schema = z.object({
  path: z.string().min(1),
  orient: z.enum(['records', 'columns']).default('records'),
  indent: z.number().int().nonnegative().optional(),
});

describe('parseAdapterConfig', () => {
  it('should apply schema defaults', () => {
    expect(parseAdapterConfig(schema, { path: 'a.json' }, 'json')).toEqual({ path: 'a.json', orient: 'records' });
  });

  it('should throw ConfigurationError listing every invalid field', () => {
    let caught: unknown;
    try {
      parseAdapterConfig(schema, { path: '', orient: 'index' }, 'json');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    const error = caught instanceof ConfigurationError ? caught : null;
    expect(error?.format).toBe('json');
    expect(error?.code).toBe('CONFIGURATION');
    expect(error?.issues.map((issue) => issue.path)).toEqual(['path', 'orient']);
    expect(error?.message).toMatch(/^Invalid json adapter configuration: path: .+; orient: .+$/);
  });

  it('should report a non-object input against the root path', () => {
    expect(() => parseAdapterConfig(schema, 'a.json', 'json')).toThrow(
      /^Invalid json adapter configuration: Expected object, received string$/,
    );
  });
});

describe('compactOptions', () => {
  it('should drop undefined entries and freeze the result', () => {
    const options = compactOptions({ indent: undefined, orient: 'records', header: false, comments: null });

    expect(options).toEqual({ orient: 'records', header: false, comments: null });
    expect(Object.keys(options)).toEqual(['orient', 'header', 'comments']);
    expect(Object.isFrozen(options)).toBe(true);
  });
});
