import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  parseBoolean,
  parseChoice,
  parseInteger,
  parseList,
  parseLogLevel,
  parsePort,
  parseUrlEnv,
} from '../src/config/env-parsers.js';

describe('parseInteger', () => {
  it('falls back to the default for unusable input', () => {
    assert.equal(parseInteger(undefined, 7), 7);
    assert.equal(parseInteger('abc', 7), 7);
    assert.equal(parseInteger('3', 7, 5, 10), 7);
    assert.equal(parseInteger('11', 7, 5, 10), 7);
    assert.equal(parseInteger('8', 7, 5, 10), 8);
  });
});

describe('parsePort', () => {
  it('accepts 0 for an ephemeral port', () => {
    assert.equal(parsePort('0', 8000), 0);
  });

  it('rejects ports outside 1-65535', () => {
    assert.equal(parsePort('70000', 8000), 8000);
    assert.equal(parsePort('-1', 8000), 8000);
    assert.equal(parsePort('9000', 8000), 9000);
  });
});

describe('parseBoolean', () => {
  it('treats anything but "false" as true', () => {
    assert.equal(parseBoolean(undefined, false), false);
    assert.equal(parseBoolean('true', false), true);
    assert.equal(parseBoolean('yes', false), true);
    assert.equal(parseBoolean(' FALSE ', true), false);
  });
});

describe('parseList', () => {
  it('splits on commas and trims', () => {
    assert.deepEqual(parseList('  a@b ,  ,c@d'), ['a@b', 'c@d']);
  });
});

describe('parseChoice', () => {
  it('matches case-insensitively and falls back on unknown values', () => {
    const choices = ['strict', 'permissive'] as const;
    assert.equal(parseChoice(' STRICT ', choices, 'permissive'), 'strict');
    assert.equal(parseChoice('loose', choices, 'permissive'), 'permissive');
    assert.equal(parseChoice(undefined, choices, 'permissive'), 'permissive');
  });
});

describe('parseLogLevel', () => {
  it('defaults to info', () => {
    assert.equal(parseLogLevel(undefined), 'info');
    assert.equal(parseLogLevel('verbose'), 'info');
    assert.equal(parseLogLevel('DEBUG'), 'debug');
  });
});

describe('parseUrlEnv', () => {
  it('parses valid URLs and throws on invalid ones', () => {
    assert.equal(
      parseUrlEnv('https://api.example.test/1', 'X')?.href,
      'https://api.example.test/1'
    );
    assert.equal(parseUrlEnv(undefined, 'X'), undefined);
    assert.throws(() => parseUrlEnv('not a url', 'X'), /Invalid X value/);
  });
});
