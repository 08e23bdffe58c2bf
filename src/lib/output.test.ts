import { afterEach, describe, test, expect, vi } from 'vitest';
import { debug, formatTable, outputError, paint, setVerbose, stripAnsi, type Column } from './output.js';
import { RepoNotFoundError } from './errors.js';

describe('formatTable', () => {
  const columns: Column[] = [
    { header: 'Name', key: 'name' },
    { header: 'Path', key: 'path' },
  ];

  test('given empty rows, should return "No results."', () => {
    expect(formatTable([], columns)).toBe('No results.');
  });

  test('given rows, should pad every column to its widest cell', () => {
    const rows = [
      { name: 'webapp', path: '/repos/webapp' },
      { name: 'api', path: '/repos/api' },
    ];
    const lines = stripAnsi(formatTable(rows, columns)).split('\n');

    expect(lines).toEqual([
      'Name    Path         ',
      '──────  ─────────────',
      'webapp  /repos/webapp',
      'api     /repos/api   ',
    ]);
  });

  test('given ANSI-colored values, should measure width from the visible text', () => {
    const colored: Column[] = [
      { header: 'Repo', key: 'name', format: (v) => paint(String(v), 'cyan') },
    ];
    const lines = stripAnsi(formatTable([{ name: 'webapp' }], colored)).split('\n');

    expect(lines[0]).toBe('Repo  ');
    expect(lines[2]).toBe('webapp');
  });

  test('given an explicit column width, should use it', () => {
    const fixed: Column[] = [{ header: 'ID', key: 'id', width: 6 }];
    const lines = stripAnsi(formatTable([{ id: 'x' }], fixed)).split('\n');

    expect(lines[2]).toBe('x     ');
  });

  test('given a missing key, should render an empty cell', () => {
    const lines = stripAnsi(formatTable([{ name: 'webapp' }], columns)).split('\n');

    expect(lines[2]).toBe('webapp      ');
  });
});

describe('stripAnsi', () => {
  test('given painted text, should return the plain text', () => {
    expect(stripAnsi(paint('done', 'green'))).toBe('done');
  });
});

describe('outputError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('given json mode, should print the message and code as JSON', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    outputError(new RepoNotFoundError('webapp'), true);

    const expected = JSON.stringify({
      error: "Repository 'webapp' not found. Use 'adeck add-repo' first.",
      code: 'REPO_NOT_FOUND',
    });
    expect(errorSpy).toHaveBeenCalledWith(expected);
  });

  test('given a plain error in json mode, should use the UNKNOWN code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    outputError(new Error('boom'), true);

    expect(errorSpy).toHaveBeenCalledWith('{"error":"boom","code":"UNKNOWN"}');
  });

  test('given text mode, should print a single Error line', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    outputError(new Error('boom'), false);

    expect(stripAnsi(String(errorSpy.mock.calls[0]?.[0]))).toBe('Error: boom');
  });
});

describe('debug', () => {
  afterEach(() => {
    setVerbose(false);
    vi.restoreAllMocks();
  });

  test('given verbose off, should print nothing', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setVerbose(false);
    debug('linked node_modules');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  test('given verbose on, should print to stderr', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setVerbose(true);
    debug('linked node_modules');

    expect(stripAnsi(String(errorSpy.mock.calls[0]?.[0]))).toBe('· linked node_modules');
  });
});
