import { getConfig, type SqlDialect } from '../config.js';
import type { TableMetadata } from '../metadata/types.js';
import type { KpiCandidate } from '../types.js';
import { getLogger } from '../utils/logger.js';
import { defaultRetryPolicy, withRetry, type RetryPolicy } from '../utils/retry.js';
import type { TextGenerator } from './llm.js';
import { parseKpiResponse } from './parse.js';
import { KPI_SYSTEM_PROMPT, buildKpiPrompt } from './prompts.js';

export interface KpiGeneratorOptions {
  maxFields: number;
  maxKpis: number;
  dialect: SqlDialect;
  retryPolicy: RetryPolicy;
}

export class KpiGenerator {
  private options: KpiGeneratorOptions;
  private logger = getLogger().child({ component: 'KpiGenerator' });

  constructor(
    private llm: TextGenerator,
    options?: Partial<KpiGeneratorOptions>
  ) {
    const config = getConfig();
    this.options = {
      maxFields: options?.maxFields ?? config.MAX_PROMPT_FIELDS,
      maxKpis: options?.maxKpis ?? config.MAX_KPIS_PER_TABLE,
      dialect: options?.dialect ?? config.SQL_DIALECT,
      retryPolicy: options?.retryPolicy ?? defaultRetryPolicy(),
    };
  }

  async generate(metadata: TableMetadata): Promise<KpiCandidate[]> {
    const prompt = buildKpiPrompt(metadata, this.options);
    this.logger.info(
      { table: metadata.name, fields: metadata.fields.length, promptFields: Math.min(metadata.fields.length, this.options.maxFields) },
      'Generating KPIs'
    );

    const response = await withRetry(
      () => this.llm.complete({ system: KPI_SYSTEM_PROMPT, prompt, maxOutputTokens: 4000, temperature: 0.3 }),
      this.options.retryPolicy,
      `generate:${metadata.name}`,
      this.logger
    );

    const { candidates, discarded } = parseKpiResponse(response, metadata.name, this.options.maxKpis);

    for (const record of discarded) {
      this.logger.warn({ table: metadata.name, index: record.index, reason: record.reason }, 'Discarded KPI record');
    }
    this.logger.info({ table: metadata.name, candidates: candidates.length, discarded: discarded.length }, 'Parsed KPI candidates');

    return candidates;
  }
}
