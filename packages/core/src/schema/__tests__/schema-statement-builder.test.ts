import { describe, it, expect } from 'vitest';

import { TestDialect } from '../../__tests__/test-dialect';
import { SchemaStatementBuilder } from '../schema-statement-builder';

describe('SchemaStatementBuilder', () => {
  const schema = new SchemaStatementBuilder(new TestDialect());

  describe('tables', () => {
    it('should create a table from a column map', () => {
      expect(schema.createTable('users', { id: 'pk', name: 'string NOT NULL', age: 'integer' })).toBe(
        'CREATE TABLE users (\n\tid int NOT NULL PRIMARY KEY,\n\tname varchar(255) NOT NULL,\n\tage int(11)\n)',
      );
    });

    it('should accept column tuples, raw definitions and table options', () => {
      expect(schema.createTable('t', [['a', 'string(32)'], 'PRIMARY KEY (a)'], 'ENGINE=InnoDB')).toBe(
        'CREATE TABLE t (\n\ta varchar(32),\n\tPRIMARY KEY (a)\n) ENGINE=InnoDB',
      );
    });

    it('should rename, drop and truncate tables', () => {
      expect(schema.renameTable('a', 'b')).toBe('RENAME TABLE a TO b');
      expect(schema.dropTable('t')).toBe('DROP TABLE t');
      expect(schema.truncateTable('t')).toBe('TRUNCATE TABLE t');
    });
  });

  describe('columns', () => {
    it('should add and drop columns', () => {
      expect(schema.addColumn('t', 'c', 'string')).toBe('ALTER TABLE t ADD c varchar(255)');
      expect(schema.dropColumn('t', 'c')).toBe('ALTER TABLE t DROP COLUMN c');
    });

    it('should rename and alter columns', () => {
      expect(schema.renameColumn('t', 'a', 'b')).toBe('ALTER TABLE t RENAME COLUMN a TO b');
      expect(schema.alterColumn('t', 'c', 'integer NOT NULL')).toBe(
        'ALTER TABLE t CHANGE c c int(11) NOT NULL',
      );
    });

    it('should pass unknown column types through', () => {
      expect(schema.getColumnType('geometry')).toBe('geometry');
      expect(schema.getColumnType('decimal(8,3)')).toBe('decimal(8,3)');
    });
  });

  describe('keys and indexes', () => {
    it('should add primary keys from a string or a list', () => {
      expect(schema.addPrimaryKey('pk_t', 't', 'a, b')).toBe(
        'ALTER TABLE t ADD CONSTRAINT pk_t PRIMARY KEY (a, b)',
      );
      expect(schema.addPrimaryKey('pk_t', 't', ['a', 'b'])).toBe(
        'ALTER TABLE t ADD CONSTRAINT pk_t PRIMARY KEY (a, b)',
      );
      expect(schema.dropPrimaryKey('pk_t', 't')).toBe('ALTER TABLE t DROP CONSTRAINT pk_t');
    });

    it('should add foreign keys with actions', () => {
      expect(
        schema.addForeignKey('fk_user', 'posts', 'user_id', 'users', 'id', {
          onDelete: 'CASCADE',
          onUpdate: 'RESTRICT',
        }),
      ).toBe(
        'ALTER TABLE posts ADD CONSTRAINT fk_user FOREIGN KEY (user_id) REFERENCES users (id) ON DELETE CASCADE ON UPDATE RESTRICT',
      );
      expect(schema.addForeignKey('fk_user', 'posts', ['user_id'], 'users', ['id'])).toBe(
        'ALTER TABLE posts ADD CONSTRAINT fk_user FOREIGN KEY (user_id) REFERENCES users (id)',
      );
      expect(schema.dropForeignKey('fk_user', 'posts')).toBe('ALTER TABLE posts DROP CONSTRAINT fk_user');
    });

    it('should create and drop indexes', () => {
      expect(schema.createIndex('idx_ab', 't', ['a', 'b'])).toBe('CREATE INDEX idx_ab ON t (a, b)');
      expect(schema.createIndex('idx_a', 't', 'a', true)).toBe('CREATE UNIQUE INDEX idx_a ON t (a)');
      expect(schema.dropIndex('idx_a', 't')).toBe('DROP INDEX idx_a ON t');
    });
  });

  describe('quoting', () => {
    const quoted = new SchemaStatementBuilder(new TestDialect('"'));

    it('should quote every name', () => {
      expect(quoted.addForeignKey('fk', 'app.posts', 'user_id', 'users', 'id')).toBe(
        'ALTER TABLE "app"."posts" ADD CONSTRAINT "fk" FOREIGN KEY ("user_id") REFERENCES "users" ("id")',
      );
    });
  });
});
