import { describe, it, expect } from 'vitest';
import {
  CliError,
  ERROR_SUGGESTIONS,
  classifyError,
  createError,
  formatError,
  getExitCode,
} from '../errors.js';
import {
  ConfigurationError,
  RootNotFoundError,
  SourceAuthError,
  SourceRequestError,
  StorageError,
  TransientFetchError,
} from '../../core/errors.js';
import { TimeoutError } from '../../utils/async.js';

describe('createError', () => {
  it('attaches the suggestion for the code', () => {
    const error = createError('NO_DATA', 'no rows stored');

    expect(error).toBeInstanceOf(CliError);
    expect(error.code).toBe('NO_DATA');
    expect(error.suggestion).toBe(ERROR_SUGGESTIONS.NO_DATA);
  });
});

describe('classifyError', () => {
  it.each([
    [new ConfigurationError('gitlab.url', 'bad'), 'CONFIG_INVALID'],
    [new SourceAuthError('https://gitlab.example.com', '401'), 'AUTH_FAILED'],
    [new RootNotFoundError('1#2', 'gone'), 'ROOT_NOT_FOUND'],
    [new SourceRequestError('https://gitlab.example.com/api/v4/user', 503, true, 'busy'), 'SOURCE_UNAVAILABLE'],
    [new StorageError('open', true, 'locked'), 'STORAGE_ERROR'],
    [new TimeoutError(50, 'building hierarchy'), 'TIMEOUT'],
    [new Error('boom'), 'UNEXPECTED'],
    ['plain string', 'UNEXPECTED'],
  ])('maps %s to %s', (error, code) => {
    expect(classifyError(error).code).toBe(code);
  });

  it('treats argument parser errors as invalid arguments', () => {
    const error = Object.assign(new TypeError("Unknown option '--bogus'"), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });

    expect(classifyError(error).code).toBe('INVALID_ARGUMENT');
  });

  it('keeps the code of other library errors in the details', () => {
    const error = classifyError(new TransientFetchError('children', '1#2', 'reset'));

    expect(error.code).toBe('UNEXPECTED');
    expect(error.details).toEqual({ code: 'TRANSIENT_FETCH' });
  });

  it('keeps a CliError as it is', () => {
    const error = createError('TIMEOUT', 'too slow');

    expect(classifyError(error)).toBe(error);
  });
});

describe('formatError', () => {
  it('prints the code, the message and the suggestion', () => {
    expect(formatError(createError('INVALID_ARGUMENT', '--group is required'))).toBe(
      `Error [INVALID_ARGUMENT]: --group is required\n\nSuggestion: ${ERROR_SUGGESTIONS.INVALID_ARGUMENT}`,
    );
  });

  it('omits the suggestion when there is none', () => {
    expect(formatError(new CliError('plain', 'UNEXPECTED'))).toBe('Error [UNEXPECTED]: plain');
  });
});

describe('getExitCode', () => {
  it('uses 2 for usage and configuration errors and 1 otherwise', () => {
    expect(getExitCode(createError('INVALID_ARGUMENT', 'x'))).toBe(2);
    expect(getExitCode(new ConfigurationError('logLevel', 'x'))).toBe(2);
    expect(getExitCode(new RootNotFoundError('1#1', 'x'))).toBe(1);
    expect(getExitCode(new Error('x'))).toBe(1);
  });
});
