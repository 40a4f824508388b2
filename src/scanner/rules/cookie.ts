import { Severity, type CookieRule } from '../../types.js';

export const cookieRules: CookieRule[] = [
  {
    id: 'COOKIE_NO_HTTPONLY',
    category: 'Insecure Cookie',
    severity: Severity.Medium,
    message: 'Cookie without HttpOnly — readable from JavaScript (XSS risk)',
    test: (cookie) => !cookie.isHttpOnly(),
    cwe: 'CWE-1004',
    owasp: 'A05:2021',
    fix: { description: 'Add the HttpOnly flag so client-side scripts cannot read the cookie' },
  },
  {
    id: 'COOKIE_NO_SECURE',
    category: 'Insecure Cookie',
    severity: Severity.Medium,
    message: 'Cookie set over HTTPS without the Secure flag — may be sent over HTTP',
    test: (cookie) => cookie.url.startsWith('https:') && !cookie.isSecure(),
    cwe: 'CWE-614',
    owasp: 'A05:2021',
    fix: { description: 'Add the Secure flag so the cookie is only sent over HTTPS' },
  },
  {
    id: 'COOKIE_EXPIRED',
    category: 'Stale Cookie',
    severity: Severity.Info,
    message: 'Cookie has already expired',
    test: (cookie, now) => cookie.isExpired(now),
  },
];
