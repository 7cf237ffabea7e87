import { describe, it, expect, afterEach } from 'vitest';

import { DialectNotFoundError } from '../../errors';
import { TestDialect } from '../../__tests__/test-dialect';
import {
  createDialect,
  getRegisteredDialects,
  hasDialect,
  registerDialect,
  unregisterDialect,
} from '../dialect-registry';

describe('dialect registry', () => {
  afterEach(() => {
    unregisterDialect('test');
  });

  it('should create a registered dialect', () => {
    registerDialect('test', () => new TestDialect());

    expect(createDialect('test')).toBeInstanceOf(TestDialect);
    expect(hasDialect('test')).toBe(true);
    expect(getRegisteredDialects()).toContain('test');
  });

  it('should match names case-insensitively', () => {
    registerDialect('Test', () => new TestDialect());
    expect(createDialect('TEST').name).toBe('test');
  });

  it('should create a new instance per call', () => {
    registerDialect('test', () => new TestDialect());
    expect(createDialect('test')).not.toBe(createDialect('test'));
  });

  it('should throw for an unknown dialect', () => {
    expect(hasDialect('oracle')).toBe(false);
    expect(() => createDialect('oracle')).toThrow(DialectNotFoundError);
    expect(() => createDialect('oracle')).toThrow('No dialect registered for: oracle.');
  });
});
