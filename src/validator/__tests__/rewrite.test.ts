import { describe, it, expect } from 'vitest';
import { addNullGuards, applyRewrites, hasDateFilter, injectDefaultTimeWindow, pickDateColumn } from '../rewrite.js';
import type { TableMetadata } from '../../metadata/types.js';
import { ordersMetadata } from '../../__tests__/fixtures.js';

const postgres = { dialect: 'postgres', dateColumn: 'create_date' } as const;
const mysql = { dialect: 'mysql', dateColumn: 'create_date' } as const;

describe('addNullGuards', () => {
  it('guards a bare aggregated column', () => {
    expect(addNullGuards('SELECT SUM(payment_total) FROM orders')).toBe(
      'SELECT SUM(payment_total) FROM orders WHERE payment_total IS NOT NULL'
    );
  });

  it('guards each column once', () => {
    expect(addNullGuards('SELECT MIN(payment_total), MAX(payment_total), AVG(discount) FROM orders WHERE status = 1')).toBe(
      'SELECT MIN(payment_total), MAX(payment_total), AVG(discount) FROM orders WHERE status = 1 AND payment_total IS NOT NULL AND discount IS NOT NULL'
    );
  });

  it('leaves expressions, counts and guarded columns alone', () => {
    const sqls = [
      'SELECT SUM(payment_total * 2) FROM orders',
      'SELECT COUNT(payment_total) FROM orders',
      'SELECT SUM(payment_total) FROM orders WHERE payment_total IS NOT NULL',
    ];
    for (const sql of sqls) {
      expect(addNullGuards(sql)).toBe(sql);
    }
  });
});

describe('pickDateColumn', () => {
  it('prefers the configured column and falls back to the first timestamp', () => {
    expect(pickDateColumn(ordersMetadata, 'CREATE_DATE')).toBe('create_date');
    expect(pickDateColumn(ordersMetadata, 'updated_at')).toBe('create_date');
    expect(pickDateColumn({ ...ordersMetadata, fields: ordersMetadata.fields.slice(0, 3) }, 'create_date')).toBeUndefined();
  });
});

describe('hasDateFilter', () => {
  it.each([
    ["SELECT COUNT(*) FROM orders WHERE create_date > '2024-01-01'", true],
    ['SELECT COUNT(*) FROM orders WHERE created_at >= NOW() - 7', true],
    ["SELECT COUNT(*) FROM orders WHERE status = 1 AND updated > CURRENT_DATE - INTERVAL '7 days'", true],
    ['SELECT COUNT(*) FROM orders WHERE status = 1', false],
    ['SELECT COUNT(*) FROM orders', false],
    ['SELECT COUNT(*) FROM orders WHERE create_date IS NOT NULL', false],
    ["SELECT COUNT(*) FROM orders WHERE create_date <> '2024-01-01'", false],
    ["SELECT COUNT(*) FROM orders WHERE create_date BETWEEN '2024-01-01' AND '2024-02-01'", true],
    ["SELECT COUNT(*) FROM orders o WHERE '2024-01-01' <= o.create_date", true],
    ['SELECT COUNT(*) FROM (SELECT * FROM orders WHERE create_date > NOW()) o', false],
  ])('%s -> %s', (sql, expected) => {
    expect(hasDateFilter(sql, ordersMetadata)).toBe(expected);
  });
});

describe('injectDefaultTimeWindow', () => {
  it('adds a one-month PostgreSQL window', () => {
    expect(injectDefaultTimeWindow('SELECT COUNT(*) FROM orders', ordersMetadata, postgres)).toBe(
      "SELECT COUNT(*) FROM orders WHERE create_date >= CURRENT_DATE - INTERVAL '1 month'"
    );
  });

  it('adds a one-month MySQL window', () => {
    expect(injectDefaultTimeWindow('SELECT COUNT(*) FROM orders', ordersMetadata, mysql)).toBe(
      'SELECT COUNT(*) FROM orders WHERE create_date >= DATE_SUB(CURRENT_DATE, INTERVAL 1 MONTH)'
    );
  });

  it('qualifies the column with the table name when there is a join', () => {
    const sql = 'SELECT COUNT(*) FROM orders JOIN order_status ON order_status.id = orders.status';
    expect(injectDefaultTimeWindow(sql, ordersMetadata, postgres)).toBe(
      `${sql} WHERE orders.create_date >= CURRENT_DATE - INTERVAL '1 month'`
    );
  });

  it('qualifies the column with the table name after NATURAL JOIN', () => {
    expect(injectDefaultTimeWindow('SELECT COUNT(*) FROM orders NATURAL JOIN order_status', ordersMetadata, postgres)).toBe(
      "SELECT COUNT(*) FROM orders NATURAL JOIN order_status WHERE orders.create_date >= CURRENT_DATE - INTERVAL '1 month'"
    );
  });

  it('still adds the window when the date column is only NULL-checked', () => {
    expect(injectDefaultTimeWindow('SELECT COUNT(*) FROM orders WHERE create_date IS NOT NULL', ordersMetadata, postgres)).toBe(
      "SELECT COUNT(*) FROM orders WHERE create_date IS NOT NULL AND create_date >= CURRENT_DATE - INTERVAL '1 month'"
    );
  });

  it('leaves queries on other tables and tables without timestamps alone', () => {
    const noTimestamps: TableMetadata = { ...ordersMetadata, fields: ordersMetadata.fields.slice(0, 3) };

    expect(injectDefaultTimeWindow('SELECT COUNT(*) FROM order_status', ordersMetadata, postgres)).toBe(
      'SELECT COUNT(*) FROM order_status'
    );
    expect(injectDefaultTimeWindow('SELECT COUNT(*) FROM orders', noTimestamps, postgres)).toBe('SELECT COUNT(*) FROM orders');
  });

  it('is a no-op on SQL that already filters by date', () => {
    const sql = "SELECT COUNT(*) FROM orders WHERE create_date > '2024-01-01'";
    expect(injectDefaultTimeWindow(sql, ordersMetadata, postgres)).toBe(sql);
  });

  it('applying twice equals applying once', () => {
    const once = injectDefaultTimeWindow('SELECT status, COUNT(*) FROM orders GROUP BY status', ordersMetadata, mysql);
    expect(injectDefaultTimeWindow(once, ordersMetadata, mysql)).toBe(once);
  });
});

describe('applyRewrites', () => {
  it('guards NULLs, then adds the time window', () => {
    expect(applyRewrites('SELECT SUM(payment_total) FROM orders', ordersMetadata, postgres)).toEqual({
      sql: "SELECT SUM(payment_total) FROM orders WHERE payment_total IS NOT NULL AND create_date >= CURRENT_DATE - INTERVAL '1 month'",
      rewrites: ['null_guard', 'default_time_window'],
    });
  });

  it('keeps the alias of the main table', () => {
    const result = applyRewrites(
      'SELECT AVG(o.payment_total) FROM orders o WHERE o.status = 2 GROUP BY o.status',
      ordersMetadata,
      postgres
    );

    expect(result.sql).toBe(
      "SELECT AVG(o.payment_total) FROM orders o WHERE o.status = 2 AND o.payment_total IS NOT NULL AND o.create_date >= CURRENT_DATE - INTERVAL '1 month' GROUP BY o.status"
    );
  });

  it('drops a trailing comment instead of writing into it', () => {
    expect(applyRewrites('SELECT SUM(payment_total) FROM orders -- total revenue', ordersMetadata, postgres)).toEqual({
      sql: "SELECT SUM(payment_total) FROM orders WHERE payment_total IS NOT NULL AND create_date >= CURRENT_DATE - INTERVAL '1 month'",
      rewrites: ['null_guard', 'default_time_window'],
    });
  });

  it('keeps clauses that follow a comment line', () => {
    const result = applyRewrites('SELECT status, SUM(payment_total) FROM orders -- by status\nGROUP BY status', ordersMetadata, postgres);

    expect(result.sql).toBe(
      "SELECT status, SUM(payment_total) FROM orders WHERE payment_total IS NOT NULL AND create_date >= CURRENT_DATE - INTERVAL '1 month' GROUP BY status"
    );
  });

  it('is idempotent', () => {
    const first = applyRewrites('SELECT SUM(payment_total) FROM orders', ordersMetadata, postgres);
    expect(applyRewrites(first.sql, ordersMetadata, postgres)).toEqual({ sql: first.sql, rewrites: [] });
  });
});
