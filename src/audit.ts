import type { Cookie } from './element/cookie/cookie.js';
import type { ElementMutation } from './element/cookie/mutations.js';
import type { MutableOptions } from './element/mutable.js';
import type { HttpTransport } from './http/transport.js';
import { toError } from './errors.js';
import type { Logger } from './logger.js';
import type { HttpRequestPlan, HttpResponse } from './types.js';

export interface AuditSettings {
  /** Cookie names that are never audited. */
  excludeCookies: readonly string[];
  auditCookiesExtensively: boolean;
  paramFlip: boolean;
  seed: string;
}

export interface AuditContext {
  settings: AuditSettings;
  transport: HttpTransport;
  logger: Logger;
  mutable?: MutableOptions;
}

export interface AuditFailure {
  request: HttpRequestPlan;
  error: Error;
}

export interface AuditOutcome {
  skipped: boolean;
  mutations: ElementMutation[];
  requests: HttpRequestPlan[];
  /** Responses of the requests that completed, in request order. */
  responses: HttpResponse[];
  failures: AuditFailure[];
}

/**
 * Request for an element. Cookies always go out as GETs to their action
 * with the pair in the cookie channel and no query parameters.
 */
export function requestFor(element: ElementMutation): HttpRequestPlan {
  if (element.type === 'cookie') {
    return { method: 'get', url: element.action, params: {}, cookies: element.auditable, headers: {} };
  }
  return {
    method: element.method,
    url: element.action,
    params: element.auditable,
    cookies: element.opts.cookies ? { ...element.opts.cookies } : {},
    headers: {},
  };
}

export function dispatch(transport: HttpTransport, request: HttpRequestPlan): Promise<HttpResponse> {
  const { method, url, ...rest } = request;
  return method === 'post' ? transport.post(url, rest) : transport.get(url, rest);
}

export function isExcluded(cookie: Cookie, settings: Pick<AuditSettings, 'excludeCookies'>): boolean {
  return cookie.name !== null && settings.excludeCookies.includes(cookie.name);
}

/**
 * Audits one cookie with one payload. An excluded cookie is skipped before
 * any variant is built; otherwise every variant is sent concurrently. A
 * failed request is logged and listed in `failures`; the rest still count.
 */
export async function auditCookie(cookie: Cookie, payload: string, context: AuditContext): Promise<AuditOutcome> {
  const { settings, transport, logger } = context;

  if (isExcluded(cookie, settings)) {
    logger.info(`Skipping audit of '${cookie.name}' cookie.`);
    return { skipped: true, mutations: [], requests: [], responses: [], failures: [] };
  }

  const mutations = cookie.mutations(payload, {
    ...context.mutable,
    paramFlip: settings.paramFlip,
    seed: settings.seed,
    auditCookiesExtensively: settings.auditCookiesExtensively,
  });
  const requests = mutations.map(requestFor);
  logger.debug(`Auditing '${cookie.name}' cookie`, `${requests.length} request(s)`);

  const settled = await Promise.allSettled(requests.map((request) => dispatch(transport, request)));
  const responses: HttpResponse[] = [];
  const failures: AuditFailure[] = [];
  settled.forEach((result, i) => {
    if (result.status === 'fulfilled') {
      responses.push(result.value);
      return;
    }
    const error = toError(result.reason);
    const request = requests[i];
    logger.warn(`${request.method.toUpperCase()} ${request.url} failed: ${error.message}`);
    failures.push({ request, error });
  });

  return { skipped: false, mutations, requests, responses, failures };
}
