import type { Cookie } from './element/cookie/cookie.js';

export enum Severity {
  Critical = 'critical',
  High = 'high',
  Medium = 'medium',
  Low = 'low',
  Info = 'info',
}

export const SEVERITY_ORDER: Record<Severity, number> = {
  [Severity.Critical]: 0,
  [Severity.High]: 1,
  [Severity.Medium]: 2,
  [Severity.Low]: 3,
  [Severity.Info]: 4,
};

export interface FixSuggestion {
  description: string;
}

export interface Finding {
  /** Where the cookie came from: a jar path or a response URL. */
  source: string;
  /** 1-based jar line, 0 when the source has no lines. */
  line: number;
  cookie: string;
  severity: Severity;
  category: string;
  message: string;
  rule: string;
  cwe?: string;
  owasp?: string;
  fix?: FixSuggestion;
}

export interface CookieRule {
  id: string;
  category: string;
  severity: Severity;
  message: string;
  /** True when the cookie violates the rule. */
  test: (cookie: Cookie, now: Date) => boolean;
  cwe?: string;
  owasp?: string;
  fix?: FixSuggestion;
}

export interface InspectionResult {
  findings: Finding[];
  cookiesInspected: number;
  duration: number;
}

/** Name → value pairs of an element; a cookie holds at most one. */
export type Inputs = Record<string, string>;

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type HttpHeaders = Record<string, string | string[] | undefined>;

export type HttpMethod = 'get' | 'post';

export interface HttpRequestPlan {
  method: HttpMethod;
  url: string;
  params: Inputs;
  cookies: Inputs;
  headers: HttpHeaders;
}

export interface HttpResponse {
  /** Effective URL after redirects. */
  url: string;
  status: number;
  headers: HttpHeaders;
  body: string;
}

export type OutputFormat = 'terminal' | 'json' | 'sarif';
