import { describe, it, expect } from 'vitest';
import {
  AmbiguousAdapterError,
  CodecError,
  ConfigurationError,
  DataPortError,
  NoAdapterFoundError,
  TypeMismatchError,
  isDataPortError,
} from '../../../src/domain/errors/DataPortErrors.js';

describe('DataPortErrors', () => {
  it('should name each error after its class', () => {
    expect(new ConfigurationError('csv', 'bad').name).toBe('ConfigurationError');
    expect(new TypeMismatchError('csv', 'reader', 'records', ['dataframe']).name).toBe('TypeMismatchError');
    expect(new NoAdapterFoundError('csv', 'writer', 'records', []).name).toBe('NoAdapterFoundError');
  });

  it('should describe a type mismatch in terms of the adapter direction', () => {
    expect(new TypeMismatchError('feather', 'reader', 'records', ['dataframe']).message).toBe(
      "feather reader cannot produce 'records'; applicable types: dataframe",
    );
    expect(new TypeMismatchError('html', 'writer', 'Map', ['dataframe', 'records']).message).toBe(
      "html writer cannot accept 'Map'; applicable types: dataframe, records",
    );
  });

  it('should attach the type to a configuration error', () => {
    const issues = [{ path: 'path', message: 'Required' }];
    const error = new ConfigurationError('csv', 'Invalid csv adapter configuration: path: Required', issues).forType(
      'records',
    );

    expect(error.message).toBe("Invalid csv adapter configuration: path: Required (type 'records')");
    expect(error.typeId).toBe('records');
    expect(error.details).toEqual({ issues, typeId: 'records' });
    expect(new ConfigurationError('csv', 'bad').details).toEqual({ issues: [] });
  });

  it('should say when a format has no adapter at all', () => {
    expect(new NoAdapterFoundError('parquet', 'reader', 'dataframe', []).message).toBe(
      "No reader registered for format 'parquet' and type 'dataframe' (no reader is registered for it)",
    );
  });

  it('should name both classes in an ambiguity', () => {
    const error = new AmbiguousAdapterError('csv', 'writer', 'records', 'CsvWriter', 'OtherCsvWriter');
    expect(error.existing).toBe('CsvWriter');
    expect(error.incoming).toBe('OtherCsvWriter');
    expect(error.details).toEqual({ kind: 'writer', typeId: 'records', existing: 'CsvWriter', incoming: 'OtherCsvWriter' });
  });

  it('should keep the codec failure as cause', () => {
    const cause = new SyntaxError('Unexpected token');
    const error = new CodecError('json', 'load', 'JsonReader', 'records', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe('CODEC');
    expect(error.message).toBe("JsonReader failed to load json data as 'records': Unexpected token");
  });

  it('should stringify non-Error causes', () => {
    expect(new CodecError('csv', 'save', 'CsvWriter', 'dataframe', 'EACCES').message).toBe(
      "CsvWriter failed to save csv data as 'dataframe': EACCES",
    );
  });

  it('should recognise its own errors only', () => {
    expect(isDataPortError(new ConfigurationError('csv', 'bad'))).toBe(true);
    expect(new ConfigurationError('csv', 'bad')).toBeInstanceOf(DataPortError);
    expect(isDataPortError(new Error('bad'))).toBe(false);
  });
});
