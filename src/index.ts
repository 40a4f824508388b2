export { Cookie } from './element/cookie/cookie.js';
export { encode, decode } from './element/cookie/codec.js';
export { expiresToTime } from './element/cookie/timestamp.js';
export { parseCookiejar, parseCookiejarEntries, fromFile } from './element/cookie/jar.js';
export { parseSetCookie, parseSetCookies, fromSetCookie } from './element/cookie/set-cookie.js';
export {
  extractFromHeaders,
  extractFromDocument,
  fromHeaders,
  fromDocument,
  fromResponse,
} from './element/cookie/extract.js';
export { cookieMutations, PARAM_FLIP, propagationLabel } from './element/cookie/mutations.js';
export { ATTRIBUTE_NAMES, DEFAULT_ATTRIBUTES } from './element/cookie/attributes.js';
export { BaseElement, uniqueElements } from './element/base.js';
export { createMutable, createSeed, replaceStrategy, appendStrategy, DEFAULT_STRATEGIES } from './element/mutable.js';
export { Link, Form, pageFromResponse } from './element/page.js';
export { fillInputs } from './element/key-filler.js';
export { FetchTransport, cookieHeader } from './http/transport.js';
export { auditCookie, requestFor, dispatch, isExcluded } from './audit.js';
export { loadConfig, parseConfig, resolveSettings } from './config.js';
export { CookieInspector } from './scanner/inspect.js';
export { cookieRules } from './scanner/rules/cookie.js';
export { createTerminalLogger, silentLogger } from './logger.js';
export { reportTerminal } from './reporter/terminal.js';
export { reportJSON, toJSONReport } from './reporter/json.js';
export { reportSARIF, toSARIF } from './reporter/sarif.js';
export {
  TimeParseError,
  NoSuchAttributeError,
  SetCookieParseError,
  ConfigError,
  isTimeParseError,
  isNoSuchAttributeError,
  isSetCookieParseError,
} from './errors.js';
export { Severity } from './types.js';
export type { AttributeName, AttributeSet, RawAttributes } from './element/cookie/attributes.js';
export type { CookiejarEntry } from './element/cookie/jar.js';
export type { CookieMutationOptions, ElementMutation } from './element/cookie/mutations.js';
export type { Auditor, ElementType } from './element/base.js';
export type { Mutable, MutableOptions, MutationStrategy } from './element/mutable.js';
export type { Page } from './element/page.js';
export type { HttpTransport, FetchTransportOptions } from './http/transport.js';
export type { AuditContext, AuditFailure, AuditOutcome, AuditSettings } from './audit.js';
export type { CookieProbeConfig } from './config.js';
export type { InspectTarget } from './scanner/inspect.js';
export type { Logger } from './logger.js';
export type { Finding, CookieRule, InspectionResult, Inputs, Result, HttpRequestPlan, HttpResponse } from './types.js';
