import chalk from 'chalk';
import { Finding, InspectionResult, SEVERITY_ORDER, Severity } from '../types.js';
import { toJSONReport } from './json.js';

const SEVERITY_ICON: Record<Severity, string> = {
  [Severity.Critical]: chalk.bgRed.white(' CRIT '),
  [Severity.High]: chalk.red('  HIGH'),
  [Severity.Medium]: chalk.yellow('  MED '),
  [Severity.Low]: chalk.blue('  LOW '),
  [Severity.Info]: chalk.gray(' INFO '),
};

const SEVERITY_COLOR: Record<Severity, (s: string) => string> = {
  [Severity.Critical]: chalk.red,
  [Severity.High]: chalk.red,
  [Severity.Medium]: chalk.yellow,
  [Severity.Low]: chalk.blue,
  [Severity.Info]: chalk.gray,
};

export function reportTerminal(result: InspectionResult): void {
  const { findings } = result;

  console.log();
  console.log(chalk.bold('🍪 Cookie Review'));
  console.log(chalk.gray('─'.repeat(60)));
  console.log();

  if (findings.length === 0) {
    console.log(chalk.green('  ✅ No cookie issues found!'));
    console.log();
    printSummary(result);
    return;
  }

  for (const [source, byCookie] of groupFindings(findings)) {
    console.log(chalk.bold.underline(`  ${source}`));
    console.log();

    for (const cookieFindings of byCookie.values()) {
      const { cookie, line } = cookieFindings[0];
      const where = line > 0 ? chalk.gray(` (line ${line})`) : '';
      console.log(`    🍪 ${chalk.bold(cookie || '(unnamed)')}${where}`);

      for (const f of cookieFindings) {
        const icon = SEVERITY_ICON[f.severity];
        const color = SEVERITY_COLOR[f.severity];
        console.log(`      ${icon}  ${color(f.message)}`);

        const meta = [f.category, f.rule];
        if (f.cwe) meta.push(chalk.cyan(f.cwe));
        if (f.owasp) meta.push(chalk.magenta(f.owasp));
        console.log(chalk.gray(`             ${meta.join(' · ')}`));

        if (f.fix) {
          console.log(chalk.green(`             💡 Fix: ${f.fix.description}`));
        }
      }
      console.log();
    }
  }

  printSummary(result);
}

/**
 * Source → cookie → findings, most severe first. A cookie is keyed by name and
 * jar line so same-named cookies on different lines stay apart.
 */
export function groupFindings(findings: Finding[]): Map<string, Map<string, Finding[]>> {
  const bySource = new Map<string, Map<string, Finding[]>>();
  const sorted = [...findings].sort((a, b) => SEVERITY_ORDER[a.severity] - SEVERITY_ORDER[b.severity]);
  for (const f of sorted) {
    const byCookie = bySource.get(f.source) ?? new Map<string, Finding[]>();
    const key = f.line > 0 ? `${f.cookie}:${f.line}` : f.cookie;
    const arr = byCookie.get(key) ?? [];
    arr.push(f);
    byCookie.set(key, arr);
    bySource.set(f.source, byCookie);
  }
  return bySource;
}

function printSummary(result: InspectionResult): void {
  const { findings, cookiesInspected } = result;
  const counts = toJSONReport(result).summary;

  console.log(chalk.gray('─'.repeat(60)));
  console.log(chalk.bold('  Summary'));
  console.log();
  const affected = new Set(findings.map((f) => `${f.source}\0${f.cookie}\0${f.line}`)).size;
  console.log(`    Cookies:        ${cookiesInspected}`);
  console.log(`    With issues:    ${affected}`);
  console.log(`    Issues found:   ${findings.length}`);
  console.log();

  if (counts[Severity.Critical] > 0) console.log(chalk.red(`    🔴 Critical: ${counts[Severity.Critical]}`));
  if (counts[Severity.High] > 0) console.log(chalk.red(`    🟠 High:     ${counts[Severity.High]}`));
  if (counts[Severity.Medium] > 0) console.log(chalk.yellow(`    🟡 Medium:   ${counts[Severity.Medium]}`));
  if (counts[Severity.Low] > 0) console.log(chalk.blue(`    🔵 Low:      ${counts[Severity.Low]}`));
  if (counts[Severity.Info] > 0) console.log(chalk.gray(`    ⚪ Info:     ${counts[Severity.Info]}`));
  console.log();
}
