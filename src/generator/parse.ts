import { z } from 'zod';
import { generationFailedError } from '../errors.js';
import type { KpiCandidate } from '../types.js';

const text = (fallback: string) =>
  z.string().nullish().transform(v => (v && v.trim() ? v.trim() : fallback));

export const KpiRecordSchema = z.object({
  kpi_name: z.string().trim().min(1, 'kpi_name is empty'),
  description: text('No description provided'),
  business_value: text('Business value not specified'),
  sql_query: z.string().trim().min(1, 'sql_query is empty'),
  output_format: text('Not specified'),
});

export type KpiRecord = z.infer<typeof KpiRecordSchema>;

export interface DiscardedRecord {
  index: number;
  reason: string;
}

export interface ParsedKpis {
  candidates: KpiCandidate[];
  discarded: DiscardedRecord[];
}

/**
 * Find a JSON array in model output that may be wrapped in code fences or
 * surrounded by prose. Returns undefined when nothing parses.
 */
export function extractJsonArray(raw: string): unknown[] | undefined {
  const trimmed = raw.replace(/^\uFEFF/, '').trim();

  const attempts = [trimmed];
  const fence = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  if (fence?.[1]) attempts.push(fence[1].trim());

  const start = trimmed.indexOf('[');
  const end = trimmed.lastIndexOf(']');
  if (start !== -1 && end > start) attempts.push(trimmed.slice(start, end + 1));

  for (const candidate of attempts) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      if (Array.isArray(parsed)) return parsed;
      // Some models wrap the list: {"kpis": [...]}
      if (parsed && typeof parsed === 'object') {
        const nested = Object.values(parsed).find(Array.isArray);
        if (nested) return nested;
      }
    } catch {
      // next strategy
    }
  }
  return undefined;
}

/**
 * Turn a model response into candidates. A response with no JSON array, or
 * with an array none of whose records are usable, is a GENERATION_FAILED
 * error; individual bad records are dropped and reported in `discarded`.
 */
export function parseKpiResponse(raw: string, table: string, maxKpis: number): ParsedKpis {
  const records = extractJsonArray(raw);
  if (!records) {
    throw generationFailedError(table, `no JSON array in model response (starts with ${JSON.stringify(raw.slice(0, 60))})`);
  }

  const candidates: KpiCandidate[] = [];
  const discarded: DiscardedRecord[] = [];
  const names = new Set<string>();

  records.forEach((record, index) => {
    const result = KpiRecordSchema.safeParse(record);
    if (!result.success) {
      discarded.push({
        index,
        reason: result.error.issues.map(i => `${i.path.join('.') || 'record'}: ${i.message}`).join('; '),
      });
      return;
    }

    const key = result.data.kpi_name.toLowerCase();
    if (names.has(key)) {
      discarded.push({ index, reason: `duplicate kpi_name "${result.data.kpi_name}"` });
      return;
    }
    if (candidates.length >= maxKpis) {
      discarded.push({ index, reason: `over the limit of ${maxKpis} KPIs` });
      return;
    }

    names.add(key);
    candidates.push(toCandidate(result.data, table));
  });

  if (records.length > 0 && candidates.length === 0) {
    throw generationFailedError(table, `none of ${records.length} records had the expected shape`);
  }

  return { candidates, discarded };
}

function toCandidate(record: KpiRecord, table: string): KpiCandidate {
  return Object.freeze({
    table,
    name: record.kpi_name,
    description: record.description,
    businessValue: record.business_value,
    sql: record.sql_query,
    outputFormat: record.output_format,
  });
}
