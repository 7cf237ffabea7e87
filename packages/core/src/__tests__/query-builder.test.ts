import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { registerDialect, unregisterDialect } from '../dialect/dialect-registry';
import { UnknownOperatorError, UnsupportedByDialectError } from '../errors';
import { Query } from '../query/query';
import { QueryBuilder } from '../query-builder';
import { TestDialect } from './test-dialect';

import type { BuildErrorEvent, BuildEvent } from '../query-builder';
import type { Logger } from '../types';

describe('QueryBuilder', () => {
  let logger: Logger;
  let qb: QueryBuilder;

  beforeEach(() => {
    logger = {
      error: vi.fn(),
      warn: vi.fn(),
      info: vi.fn(),
      debug: vi.fn(),
    };
    qb = new QueryBuilder(new TestDialect(), { logger });
  });

  describe('build', () => {
    it('should build a Query', () => {
      const result = qb.build(new Query().from('t').where({ id: 5 }));

      expect(result).toEqual({ sql: 'SELECT * FROM t WHERE id=:qp0', params: { ':qp0': 5 } });
    });

    it('should build a plain query description', () => {
      expect(qb.build({ from: ['t'], limit: 1 }).sql).toBe('SELECT * FROM t LIMIT 1');
    });

    it('should log and emit each build', () => {
      const listener = vi.fn<(event: BuildEvent) => void>();
      qb.on('build', listener);

      qb.build(new Query().from('t').where({ id: 5 }));

      expect(logger.debug).toHaveBeenCalledWith('Built select statement: SELECT * FROM t WHERE id=:qp0', {
        params: { ':qp0': 5 },
      });
      expect(listener).toHaveBeenCalledWith({
        kind: 'select',
        sql: 'SELECT * FROM t WHERE id=:qp0',
        params: { ':qp0': 5 },
      });
    });

    it('should truncate long SQL in the log', () => {
      const columns = Array.from({ length: 60 }, (_, i) => `column_${i}`);
      const { sql } = qb.build({ select: columns, from: ['t'] });

      expect(logger.debug).toHaveBeenCalledWith(`Built select statement: ${sql.slice(0, 200)}...`, {
        params: {},
      });
    });

    it('should log, emit and rethrow failures', () => {
      const listener = vi.fn<(event: BuildErrorEvent) => void>();
      qb.on('error', listener);

      expect(() => qb.build({ from: ['t'], where: ['bogus', 'a'] })).toThrow(UnknownOperatorError);

      expect(logger.error).toHaveBeenCalledWith(
        'Failed to build select statement: Found unknown operator in condition: BOGUS',
        { error: expect.any(UnknownOperatorError) },
      );
      expect(listener).toHaveBeenCalledWith({ kind: 'select', error: expect.any(UnknownOperatorError) });
      expect(logger.debug).not.toHaveBeenCalled();
    });

    it('should work without a logger', () => {
      const silent = new QueryBuilder(new TestDialect());
      expect(silent.build({ from: ['t'] }).sql).toBe('SELECT * FROM t');
    });
  });

  describe('DML', () => {
    it('should build insert, update and delete with fresh params', () => {
      expect(qb.insert('users', { name: 'Ann' })).toEqual({
        sql: 'INSERT INTO users (name) VALUES (:qp0)',
        params: { ':qp0': 'Ann' },
      });
      expect(qb.update('users', { name: 'Bo' }, { id: 1 })).toEqual({
        sql: 'UPDATE users SET name=:qp0 WHERE id=:qp1',
        params: { ':qp0': 'Bo', ':qp1': 1 },
      });
      expect(qb.delete('users', { id: 1 })).toEqual({
        sql: 'DELETE FROM users WHERE id=:qp0',
        params: { ':qp0': 1 },
      });
    });

    it('should surface missing dialect capabilities', () => {
      expect(() => qb.batchInsert('t', ['a'], [[1]])).toThrow(UnsupportedByDialectError);
      expect(() => qb.resetSequence('t')).toThrow(UnsupportedByDialectError);
      expect(() => qb.checkIntegrity()).toThrow(UnsupportedByDialectError);
      expect(logger.error).toHaveBeenCalledTimes(3);
    });
  });

  describe('DDL', () => {
    it('should delegate to the schema builder and emit ddl events', () => {
      const listener = vi.fn<(event: BuildEvent) => void>();
      qb.on('build', listener);

      expect(qb.createTable('t', { id: 'pk' })).toBe('CREATE TABLE t (\n\tid int NOT NULL PRIMARY KEY\n)');
      expect(qb.dropTable('t')).toBe('DROP TABLE t');
      expect(listener).toHaveBeenLastCalledWith({ kind: 'ddl', sql: 'DROP TABLE t', params: {} });
    });

    it('should expose every DDL statement', () => {
      expect(qb.renameTable('a', 'b')).toBe('RENAME TABLE a TO b');
      expect(qb.truncateTable('t')).toBe('TRUNCATE TABLE t');
      expect(qb.addColumn('t', 'c', 'integer')).toBe('ALTER TABLE t ADD c int(11)');
      expect(qb.dropColumn('t', 'c')).toBe('ALTER TABLE t DROP COLUMN c');
      expect(qb.renameColumn('t', 'a', 'b')).toBe('ALTER TABLE t RENAME COLUMN a TO b');
      expect(qb.alterColumn('t', 'c', 'string')).toBe('ALTER TABLE t CHANGE c c varchar(255)');
      expect(qb.addPrimaryKey('pk', 't', 'id')).toBe('ALTER TABLE t ADD CONSTRAINT pk PRIMARY KEY (id)');
      expect(qb.dropPrimaryKey('pk', 't')).toBe('ALTER TABLE t DROP CONSTRAINT pk');
      expect(qb.addForeignKey('fk', 'p', 'u_id', 'u', 'id', { onDelete: 'SET NULL' })).toBe(
        'ALTER TABLE p ADD CONSTRAINT fk FOREIGN KEY (u_id) REFERENCES u (id) ON DELETE SET NULL',
      );
      expect(qb.dropForeignKey('fk', 'p')).toBe('ALTER TABLE p DROP CONSTRAINT fk');
      expect(qb.createIndex('idx', 't', 'a')).toBe('CREATE INDEX idx ON t (a)');
      expect(qb.dropIndex('idx', 't')).toBe('DROP INDEX idx ON t');
      expect(qb.getColumnType('string(20)')).toBe('varchar(20)');
    });
  });

  describe('for', () => {
    afterEach(() => {
      unregisterDialect('test');
    });

    it('should create a builder from the registry', () => {
      registerDialect('test', () => new TestDialect());
      const built = QueryBuilder.for('test');

      expect(built.dialect.name).toBe('test');
      expect(built.build({ from: ['t'] }).sql).toBe('SELECT * FROM t');
    });
  });
});
