import type { Cookie } from '../element/cookie/cookie.js';
import { SEVERITY_ORDER, Severity, type CookieRule, type Finding, type InspectionResult } from '../types.js';
import { cookieRules } from './rules/cookie.js';

export interface InspectTarget {
  /** Jar path or response URL. */
  source: string;
  line: number;
  cookie: Cookie;
}

export class CookieInspector {
  private rules: CookieRule[];
  private disabled = new Set<string>();
  private minSeverity: Severity = Severity.Info;

  constructor(rules?: CookieRule[]) {
    this.rules = rules ?? cookieRules;
  }

  disableRules(ids: string[]): void {
    for (const id of ids) this.disabled.add(id);
  }

  setMinSeverity(severity: Severity): void {
    this.minSeverity = severity;
  }

  inspect(targets: InspectTarget[], now: Date = new Date()): InspectionResult {
    const startTime = Date.now();
    const findings: Finding[] = [];
    const minOrder = SEVERITY_ORDER[this.minSeverity];

    for (const { source, line, cookie } of targets) {
      for (const rule of this.rules) {
        if (this.disabled.has(rule.id)) continue;
        if (SEVERITY_ORDER[rule.severity] > minOrder) continue;
        if (!rule.test(cookie, now)) continue;

        findings.push({
          source,
          line,
          cookie: cookie.name ?? '',
          severity: rule.severity,
          category: rule.category,
          message: rule.message,
          rule: rule.id,
          cwe: rule.cwe,
          owasp: rule.owasp,
          fix: rule.fix,
        });
      }
    }

    return { findings, cookiesInspected: targets.length, duration: Date.now() - startTime };
  }
}
