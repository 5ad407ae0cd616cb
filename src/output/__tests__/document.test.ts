import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  acceptedFromDocument,
  parseKpiDocument,
  readKpiDocument,
  toTableEntry,
  writeKpiDocument,
  type KpiDocument,
} from '../document.js';
import type { ValidationOutcome } from '../../types.js';
import { accepted, candidate, ordersMetadata } from '../../__tests__/fixtures.js';

const problematic: ValidationOutcome = {
  candidate: candidate('Avg Orders', 'SELECT AVG(COUNT(*)) FROM orders'),
  status: 'problematic',
  originalSql: 'SELECT AVG(COUNT(*)) FROM orders',
  executedSql: 'SELECT AVG(COUNT(*)) FROM orders',
  rewrites: [],
  issues: [],
  error: 'nested aggregate',
};

describe('toTableEntry', () => {
  it('serializes metadata and outcomes', () => {
    const entry = toTableEntry(ordersMetadata, [accepted('Revenue', 'SELECT 1 FROM orders'), problematic]);

    expect(entry).toMatchObject({
      table_name: 'orders',
      table_id: 10,
      database_id: 1,
      description: 'Customer orders',
      schema: 'public',
      total_fields: 4,
    });
    expect(entry.field_details[1]).toEqual({
      name: 'status',
      type: 'type/Integer',
      description: null,
      semantic_type: 'foreign_key',
      foreign_key: { target_table: 'order_status', target_field: 'id' },
    });
    expect(entry.relationships).toEqual([{ field: 'status', target_table: 'order_status', target_field: 'id', resolved: true }]);
    expect(entry.kpis).toEqual([
      {
        kpi_name: 'Revenue',
        description: 'Revenue description',
        business_value: 'Revenue value',
        sql_query: 'SELECT 1 FROM orders',
        original_sql: 'SELECT 1 FROM orders',
        output_format: 'Single number',
        validation_status: 'valid',
        rewrites: [],
        row_count: 1,
        error: null,
      },
      {
        kpi_name: 'Avg Orders',
        description: 'Avg Orders description',
        business_value: 'Avg Orders value',
        sql_query: 'SELECT AVG(COUNT(*)) FROM orders',
        original_sql: 'SELECT AVG(COUNT(*)) FROM orders',
        output_format: 'Single number',
        validation_status: 'problematic',
        rewrites: [],
        row_count: null,
        error: 'nested aggregate',
      },
    ]);
  });
});

describe('document files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'kpi-document-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the document and reads it back', async () => {
    const path = join(dir, 'out', 'kpis.json');
    const document: KpiDocument = { orders: toTableEntry(ordersMetadata, [accepted('Revenue', 'SELECT 1 FROM orders')]) };

    await writeKpiDocument(path, document);

    expect(readdirSync(join(dir, 'out'))).toEqual(['kpis.json']);
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(document);
    await expect(readKpiDocument(path)).resolves.toEqual(document);
  });
});

describe('parseKpiDocument', () => {
  it('rejects invalid JSON and documents of the wrong shape', () => {
    expect(() => parseKpiDocument('{', 'kpis.json')).toThrow(/kpis.json is not valid JSON/);
    expect(() => parseKpiDocument('{"orders": {"table_name": "orders"}}', 'kpis.json')).toThrow(
      /kpis.json is not a KPI document/
    );
  });
});

describe('acceptedFromDocument', () => {
  it('rebuilds valid and fixed outcomes grouped by database', () => {
    const document: KpiDocument = {
      orders: toTableEntry(ordersMetadata, [
        { ...accepted('Revenue', 'SELECT SUM(total) FROM orders'), status: 'fixed', executedSql: 'SELECT SUM(payment_total) FROM orders' },
        problematic,
      ]),
      events: toTableEntry({ ...ordersMetadata, id: 30, name: 'events', databaseId: 2 }, [
        accepted('Event Count', 'SELECT COUNT(*) FROM events', 'events'),
      ]),
    };

    const batches = acceptedFromDocument(document);

    expect(batches.map(b => [b.databaseId, b.outcomes.map(o => o.candidate.name)])).toEqual([
      [1, ['Revenue']],
      [2, ['Event Count']],
    ]);
    expect(batches[0].outcomes[0]).toMatchObject({
      status: 'fixed',
      originalSql: 'SELECT SUM(total) FROM orders',
      executedSql: 'SELECT SUM(payment_total) FROM orders',
      rowCount: 1,
      candidate: { table: 'orders', name: 'Revenue', sql: 'SELECT SUM(total) FROM orders' },
    });
  });
});
