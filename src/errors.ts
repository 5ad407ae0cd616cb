export type ErrorCode =
  | 'AUTHENTICATION_FAILURE'
  | 'SERVICE_UNAVAILABLE'
  | 'NOT_FOUND'
  | 'GENERATION_FAILED'
  | 'REGISTRATION_FAILED'
  | 'QUERY_FAILED'
  | 'METABASE_ERROR'
  | 'CONFIG_ERROR';

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  suggestions?: string[];
  status?: number;
  table?: string;
  kpi?: string;
}

export class PipelineError extends Error {
  readonly code: ErrorCode;
  readonly suggestions?: string[];
  readonly details: Record<string, unknown>;

  constructor(details: ErrorDetails & Record<string, unknown>) {
    const { code, message, suggestions, ...rest } = details;
    super(message);
    this.name = 'PipelineError';
    this.code = code;
    this.suggestions = suggestions;
    this.details = rest;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.suggestions?.length && { suggestions: this.suggestions }),
        ...this.details,
      },
    };
  }
}

export function isPipelineError(err: unknown, code?: ErrorCode): err is PipelineError {
  return err instanceof PipelineError && (code === undefined || err.code === code);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function authenticationFailureError(message: string, status?: number): PipelineError {
  return new PipelineError({
    code: 'AUTHENTICATION_FAILURE',
    message: `Metabase authentication failed: ${message}`,
    status,
    suggestions: ['Check METABASE_USERNAME and METABASE_PASSWORD'],
  });
}

export function serviceUnavailableError(service: string, message: string, status?: number): PipelineError {
  return new PipelineError({
    code: 'SERVICE_UNAVAILABLE',
    message: `${service} unavailable: ${message}`,
    service,
    status,
  });
}

export function notFoundError(what: string): PipelineError {
  return new PipelineError({
    code: 'NOT_FOUND',
    message: `Not found: ${what}`,
  });
}

export function tableNotFoundError(table: string, suggestions: string[] = []): PipelineError {
  return new PipelineError({
    code: 'NOT_FOUND',
    message: `Table not found: ${table}`,
    table,
    suggestions: suggestions.length > 0 ? suggestions : undefined,
  });
}

export function generationFailedError(table: string, message: string): PipelineError {
  return new PipelineError({
    code: 'GENERATION_FAILED',
    message: `KPI generation failed for ${table}: ${message}`,
    table,
  });
}

export function registrationFailedError(table: string, kpi: string, message: string): PipelineError {
  return new PipelineError({
    code: 'REGISTRATION_FAILED',
    message: `Registration failed for ${table}/${kpi}: ${message}`,
    table,
    kpi,
  });
}

export function queryFailedError(message: string, response?: unknown): PipelineError {
  return new PipelineError({
    code: 'QUERY_FAILED',
    message,
    response,
  });
}

export function metabaseError(message: string, status?: number, response?: unknown): PipelineError {
  return new PipelineError({
    code: 'METABASE_ERROR',
    message: `Metabase API error: ${message}`,
    status,
    response,
  });
}

export function configError(message: string): PipelineError {
  return new PipelineError({
    code: 'CONFIG_ERROR',
    message,
  });
}
