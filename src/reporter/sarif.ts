import { InspectionResult, Severity } from '../types.js';

const SARIF_SEVERITY: Record<Severity, string> = {
  [Severity.Critical]: 'error',
  [Severity.High]: 'error',
  [Severity.Medium]: 'warning',
  [Severity.Low]: 'note',
  [Severity.Info]: 'note',
};

export function toSARIF(result: InspectionResult, version: string): object {
  const rules = new Map(result.findings.map((f) => [f.rule, f]));

  return {
    $schema: 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json',
    version: '2.1.0',
    runs: [
      {
        tool: {
          driver: {
            name: 'cookieprobe',
            version,
            rules: [...rules.values()].map((finding) => ({
              id: finding.rule,
              shortDescription: { text: finding.message },
              defaultConfiguration: {
                level: SARIF_SEVERITY[finding.severity],
              },
            })),
          },
        },
        results: result.findings.map((f) => ({
          ruleId: f.rule,
          level: SARIF_SEVERITY[f.severity],
          message: { text: `${f.cookie}: ${f.message}` },
          locations: [
            {
              physicalLocation: {
                artifactLocation: { uri: f.source },
                ...(f.line > 0 ? { region: { startLine: f.line } } : {}),
              },
            },
          ],
        })),
      },
    ],
  };
}

export function reportSARIF(result: InspectionResult, version: string): void {
  console.log(JSON.stringify(toSARIF(result, version), null, 2));
}
