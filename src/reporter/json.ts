import { Severity, type Finding, type InspectionResult } from '../types.js';

export interface JSONReport {
  cookiesInspected: number;
  duration: number;
  summary: Record<Severity, number>;
  findings: Finding[];
}

export function toJSONReport(result: InspectionResult): JSONReport {
  const summary: Record<Severity, number> = {
    [Severity.Critical]: 0,
    [Severity.High]: 0,
    [Severity.Medium]: 0,
    [Severity.Low]: 0,
    [Severity.Info]: 0,
  };
  for (const f of result.findings) summary[f.severity]++;

  return {
    cookiesInspected: result.cookiesInspected,
    duration: result.duration,
    summary,
    findings: result.findings,
  };
}

export function reportJSON(result: InspectionResult): void {
  console.log(JSON.stringify(toJSONReport(result), null, 2));
}
