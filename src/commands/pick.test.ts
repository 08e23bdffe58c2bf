import { describe, expect, test } from 'vitest';
import { formatPicked, parsePickFormat } from './pick.js';
import { InvalidArgsError } from '../lib/errors.js';
import { makeAgent } from '../test-fixtures.js';

const agent = { ...makeAgent(), ordinal: 3 };

describe('parsePickFormat', () => {
  test('given nothing, should default to number', () => {
    expect(parsePickFormat(undefined)).toBe('number');
  });

  test('given an unknown format, should throw InvalidArgsError', () => {
    expect(() => parsePickFormat('yaml')).toThrow(InvalidArgsError);
  });
});

describe('formatPicked', () => {
  test('given number, should print the ordinal', () => {
    expect(formatPicked(agent, 'number')).toBe('3');
  });

  test('given session, should print the session key', () => {
    expect(formatPicked(agent, 'session')).toBe('adeck-webapp-feature-auth-101500');
  });

  test('given json, should print the whole record', () => {
    const actual = JSON.parse(formatPicked(agent, 'json'));

    expect(actual).toEqual(agent);
  });
});
