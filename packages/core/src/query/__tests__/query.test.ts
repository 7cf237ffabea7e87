import { describe, it, expect } from 'vitest';

import { TestDialect } from '../../__tests__/test-dialect';
import { Expression } from '../expression';
import { Query } from '../query';
import { StatementBuilder } from '../statement-builder';

import type { SortDirection } from '../types';

describe('Query', () => {
  const builder = new StatementBuilder(new TestDialect());

  it('should collect every clause', () => {
    const spec = new Query()
      .select('id, name')
      .from('users u')
      .leftJoin('posts p', 'p.user_id = u.id')
      .where({ status: 1 })
      .andWhere(['like', 'name', 'jo%'])
      .orderBy('id DESC, name')
      .limit(10)
      .offset(5)
      .toSpec();

    expect(spec.select).toEqual(['id', 'name']);
    expect(spec.from).toEqual(['users u']);
    expect(spec.join).toEqual([['LEFT JOIN', 'posts p', 'p.user_id = u.id']]);
    expect(spec.where).toEqual(['and', { status: 1 }, ['like', 'name', 'jo%']]);
    expect(spec.orderBy).toEqual(
      new Map([
        ['id', 'DESC'],
        ['name', 'ASC'],
      ]),
    );
    expect(spec.limit).toBe(10);
    expect(spec.offset).toBe(5);
  });

  it('should build through a statement builder', () => {
    const query = new Query()
      .select('id, name')
      .from('users u')
      .leftJoin('posts p', 'p.user_id = u.id')
      .where({ status: 1 })
      .andWhere(['like', 'name', 'jo%'])
      .orderBy('id DESC, name')
      .limit(10)
      .offset(5);

    const { sql, params } = builder.build(query.toSpec());

    expect(sql).toBe(
      'SELECT id, name FROM users u LEFT JOIN posts p ON p.user_id = u.id WHERE (status=:qp0) AND (name LIKE :qp1) ORDER BY id DESC, name LIMIT 10 OFFSET 5',
    );
    expect(params).toEqual({ ':qp0': 1, ':qp1': 'jo%' });
  });

  it('should keep a select string with parentheses whole', () => {
    expect(new Query().select('COUNT(*) AS n, MAX(id)').toSpec().select).toEqual([
      'COUNT(*) AS n, MAX(id)',
    ]);
  });

  it('should set the first condition directly for orWhere', () => {
    expect(new Query().orWhere({ a: 1 }).toSpec().where).toEqual({ a: 1 });
    expect(new Query().where({ a: 1 }).orWhere({ b: 2 }).toSpec().where).toEqual([
      'or',
      { a: 1 },
      { b: 2 },
    ]);
  });

  it('should combine HAVING conditions', () => {
    const spec = new Query()
      .from('t')
      .groupBy('status')
      .having(['>', 'COUNT(*)', 1])
      .andHaving(['<', 'COUNT(*)', 9])
      .toSpec();

    expect(builder.build(spec).sql).toBe(
      'SELECT * FROM t GROUP BY status HAVING (COUNT(*)>:qp0) AND (COUNT(*)<:qp1)',
    );
  });

  it('should append with the add* methods', () => {
    const spec = new Query()
      .select('id')
      .addSelect(['name'])
      .groupBy('a')
      .addGroupBy('b, c')
      .orderBy({ a: 'ASC' })
      .addOrderBy('b DESC')
      .toSpec();

    expect(spec.select).toEqual(['id', 'name']);
    expect(spec.groupBy).toEqual(['a', 'b', 'c']);
    expect(spec.orderBy).toEqual(
      new Map([
        ['a', 'ASC'],
        ['b', 'DESC'],
      ]),
    );
  });

  it('should accept an expression for ORDER BY', () => {
    const order = new Expression('RAND()');
    expect(new Query().orderBy(order).toSpec().orderBy).toEqual(new Map([['RAND()', order]]));
  });

  it('should keep an ORDER BY string with parentheses as one expression', () => {
    const quoted = new StatementBuilder(new TestDialect('`'));
    const spec = new Query().from('t').orderBy('FIELD(id, 3, 1) DESC').toSpec();

    expect(spec.orderBy).toEqual(
      new Map([['FIELD(id, 3, 1) DESC', new Expression('FIELD(id, 3, 1) DESC')]]),
    );
    expect(quoted.build(spec).sql).toBe('SELECT * FROM `t` ORDER BY FIELD(id, 3, 1) DESC');
  });

  it('should keep ORDER BY columns in the order given', () => {
    expect(builder.build(new Query().from('t').orderBy('b, 2 DESC').toSpec()).sql).toBe(
      'SELECT * FROM t ORDER BY b, 2 DESC',
    );

    const columns = new Map<string, SortDirection>([
      ['name', 'ASC'],
      ['1', 'DESC'],
    ]);
    expect(builder.build(new Query().from('t').orderBy(columns).toSpec()).sql).toBe(
      'SELECT * FROM t ORDER BY name, 1 DESC',
    );
  });

  it('should keep a FROM string with parentheses whole', () => {
    const quoted = new StatementBuilder(new TestDialect('`'));
    const spec = new Query().from('(SELECT a, b FROM x) t').toSpec();

    expect(spec.from).toEqual(['(SELECT a, b FROM x) t']);
    expect(quoted.build(spec).sql).toBe('SELECT * FROM (SELECT a, b FROM x) t');
  });

  it('should split a plain FROM string on commas', () => {
    expect(new Query().from('users u, posts p').toSpec().from).toEqual(['users u', 'posts p']);
  });

  it('should add the join helpers with their join types', () => {
    const spec = new Query().innerJoin('a').rightJoin('b', { 'b.x': 1 }).join('CROSS JOIN', 'c').toSpec();

    expect(spec.join).toEqual([['INNER JOIN', 'a'], ['RIGHT JOIN', 'b', { 'b.x': 1 }], ['CROSS JOIN', 'c']]);
  });

  it('should inline a raw join with its params', () => {
    const spec = new Query()
      .from('users u')
      .joinRaw(new Expression('JOIN LATERAL (SELECT 1 WHERE u.id > :min) x ON true', { ':min': 3 }))
      .where({ 'u.active': 1 })
      .toSpec();

    const { sql, params } = builder.build(spec);

    expect(sql).toBe(
      'SELECT * FROM users u JOIN LATERAL (SELECT 1 WHERE u.id > :min) x ON true WHERE u.active=:qp1',
    );
    expect(params).toEqual({ ':min': 3, ':qp1': 1 });
  });

  it('should carry params given with conditions', () => {
    const spec = new Query()
      .from('t')
      .where('a = :a', { ':a': 1 })
      .andWhere({ b: 2 })
      .addParams({ ':c': 3 })
      .toSpec();

    const { sql, params } = builder.build(spec);

    expect(sql).toBe('SELECT * FROM t WHERE (a = :a) AND (b=:qp2)');
    expect(params).toEqual({ ':a': 1, ':c': 3, ':qp2': 2 });
  });

  it('should snapshot params so a query can be built twice', () => {
    const query = new Query().from('t').where({ a: 1 });

    expect(builder.build(query.toSpec()).sql).toBe('SELECT * FROM t WHERE a=:qp0');
    expect(builder.build(query.toSpec()).sql).toBe('SELECT * FROM t WHERE a=:qp0');
  });

  it('should compile a union of queries', () => {
    const spec = new Query()
      .from('a')
      .union(new Query().from('b').where({ y: 2 }))
      .toSpec();

    expect(builder.build(spec).sql).toBe('SELECT * FROM a UNION (\nSELECT * FROM b WHERE y=:qp0\n)');
  });
});
