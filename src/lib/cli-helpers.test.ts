// Path: src/lib/cli-helpers.test.ts
// Tests for command-line value parsing and rendering

import { describe, it, expect } from 'vitest';
import { CfgVaultError, FormatError } from '../utils/error.js';
import {
  exchangeFormatFromPath,
  formatValue,
  parseAssignment,
  parseExchange,
  parseValue,
  prettyLines,
  serializeExchange,
  shellQuote,
  toEnvLines,
  toExchangeFormat,
} from './cli-helpers.js';

describe('parseValue', () => {
  it('should parse integers before anything else', () => {
    expect(parseValue('42')).toBe(42);
    expect(parseValue('-7')).toBe(-7);
    expect(parseValue('1')).toBe(1);
    expect(parseValue('0')).toBe(0);
  });

  it('should parse floats', () => {
    expect(parseValue('3.14')).toBe(3.14);
    expect(parseValue('1e3')).toBe(1000);
    expect(parseValue('.5')).toBe(0.5);
  });

  it('should not treat special float words as numbers', () => {
    expect(parseValue('inf')).toBe('inf');
    expect(parseValue('NaN')).toBe('NaN');
  });

  it('should parse booleans in any case', () => {
    expect(parseValue('TRUE')).toBe(true);
    expect(parseValue('yes')).toBe(true);
    expect(parseValue('No')).toBe(false);
    expect(parseValue('false')).toBe(false);
  });

  it('should return other strings unchanged', () => {
    expect(parseValue('localhost')).toBe('localhost');
    expect(parseValue(' padded ')).toBe(' padded ');
    expect(parseValue('')).toBe('');
  });
});

describe('parseAssignment', () => {
  it('should split at the first equals sign', () => {
    expect(parseAssignment('url=a=b')).toEqual({ key: 'url', value: 'a=b' });
  });

  it('should trim key and value', () => {
    expect(parseAssignment(' host = example.com ')).toEqual({ key: 'host', value: 'example.com' });
  });

  it('should allow an empty value', () => {
    expect(parseAssignment('key=')).toEqual({ key: 'key', value: '' });
  });

  it('should reject input without a key', () => {
    expect(() => parseAssignment('novalue')).toThrow("Invalid assignment 'novalue'. Use key=value format");
    expect(() => parseAssignment('=x')).toThrow(CfgVaultError);
  });
});

describe('shellQuote', () => {
  it('should wrap in single quotes', () => {
    expect(shellQuote('plain value')).toBe("'plain value'");
  });

  it('should escape embedded single quotes', () => {
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe('formatValue', () => {
  it('should render scalars as text and collections as JSON', () => {
    expect(formatValue(true)).toBe('true');
    expect(formatValue(8080)).toBe('8080');
    expect(formatValue(['a', 1])).toBe('["a",1]');
    expect(formatValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('toEnvLines', () => {
  it('should flatten nested keys with a prefix', () => {
    const lines = toEnvLines(
      { db: { host: 'x', port: 5432 }, debug: true, tags: ['a', 'b'] },
      { prefix: 'APP_' }
    );

    expect(lines).toEqual([
      "export APP_DB_HOST='x'",
      "export APP_DB_PORT='5432'",
      "export APP_DEBUG='true'",
      `export APP_TAGS='["a","b"]'`,
    ]);
  });

  it('should keep key case when uppercasing is off', () => {
    expect(toEnvLines({ db: { host: 'x' } }, { uppercase: false })).toEqual(["export db_host='x'"]);
  });

  it('should not change the prefix case', () => {
    expect(toEnvLines({ key: 'v' }, { prefix: 'my_' })).toEqual(["export my_KEY='v'"]);
  });
});

describe('prettyLines', () => {
  it('should indent nested mappings under a header line', () => {
    expect(prettyLines({ name: 'app', server: { port: 8080, tls: { enabled: false } } })).toEqual([
      'name: app',
      'server:',
      '  port: 8080',
      '  tls:',
      '    enabled: false',
    ]);
  });
});

describe('exchange formats', () => {
  it('should normalise format names', () => {
    expect(toExchangeFormat('JSON')).toBe('json');
    expect(toExchangeFormat('yml')).toBe('yaml');
    expect(toExchangeFormat('Toml')).toBe('toml');
  });

  it('should reject unknown format names', () => {
    expect(() => toExchangeFormat('xml')).toThrow(
      'Unsupported format: xml. Supported formats: json, toml, ini, yaml'
    );
  });

  it('should pick a format from the file extension', () => {
    expect(exchangeFormatFromPath('/tmp/values.YML')).toBe('yaml');
    expect(exchangeFormatFromPath('values.ini')).toBe('ini');
    expect(exchangeFormatFromPath('values.txt')).toBe('json');
  });

  it('should parse JSON into a mapping', () => {
    expect(parseExchange('{"db": {"port": 5432}}', 'json')).toEqual({ db: { port: 5432 } });
  });

  it('should report malformed JSON', () => {
    expect(() => parseExchange('{bad', 'json')).toThrow(/^Failed to parse JSON: /);
  });

  it('should reject keys that would reach the prototype', () => {
    expect(() => parseExchange('{"__proto__": {"a": "1"}, "b": "2"}', 'json')).toThrow(FormatError);
    expect(() => parseExchange('{"__proto__": {"a": "1"}, "b": "2"}', 'json')).toThrow(
      "Reserved key '__proto__' at '__proto__'"
    );
  });

  it('should require a mapping at the root', () => {
    expect(() => parseExchange('[1, 2]', 'json')).toThrow(FormatError);
  });

  it('should parse store formats through their handlers', () => {
    expect(parseExchange('[server]\nport = 8080\n', 'toml')).toEqual({ server: { port: 8080 } });
  });

  it('should serialize JSON with two-space indent and a trailing newline', () => {
    expect(serializeExchange({ a: 1 }, 'json')).toBe('{\n  "a": 1\n}\n');
  });
});
