import chalk from 'chalk';
import type { Cookie } from '../element/cookie/cookie.js';
import type { ElementMutation } from '../element/cookie/mutations.js';
import type { OutputFormat } from '../types.js';

function flags(cookie: Cookie): string {
  const out: string[] = [];
  if (cookie.isSecure()) out.push('Secure');
  if (cookie.isHttpOnly()) out.push('HttpOnly');
  out.push(cookie.isSession() ? 'session' : `expires ${cookie.expires?.toISOString()}`);
  return out.join(' · ');
}

export function formatCookieLine(cookie: Cookie): string {
  return `${chalk.bold(cookie.toString())}  ${chalk.gray(`${cookie.domain}${cookie.path}`)}  ${chalk.gray(flags(cookie))}`;
}

export function formatMutationLine(mutation: ElementMutation): string {
  const label = chalk.cyan(mutation.altered ?? '');
  const scope = mutation.isScopeOverridden() ? chalk.magenta(' [scope override]') : '';
  if (mutation.type === 'cookie') {
    return `${chalk.yellow('cookie')}  ${mutation.toString()}  ${label}${scope}`;
  }
  const params = new URLSearchParams(mutation.auditable).toString();
  const cookies = mutation.opts.cookies ? new URLSearchParams(mutation.opts.cookies).toString() : '';
  return `${chalk.yellow(mutation.type)}  ${mutation.method.toUpperCase()} ${mutation.action}?${params}  ${chalk.gray(`cookie: ${cookies}`)}  ${label}`;
}

export function reportCookies(cookies: Cookie[], format: OutputFormat): void {
  if (format !== 'terminal') {
    console.log(JSON.stringify(cookies, null, 2));
    return;
  }
  console.log();
  console.log(chalk.bold(`🍪 ${cookies.length} cookie(s)`));
  console.log();
  for (const cookie of cookies) console.log(`    ${formatCookieLine(cookie)}`);
  console.log();
}

export function reportMutations(mutations: ElementMutation[], format: OutputFormat): void {
  if (format !== 'terminal') {
    const rows = mutations.map((m) => ({
      type: m.type,
      method: m.method,
      action: m.action,
      inputs: m.auditable,
      cookies: m.type === 'cookie' ? m.auditable : m.opts.cookies ?? {},
      altered: m.altered ?? null,
      scopeOverridden: m.isScopeOverridden(),
    }));
    console.log(JSON.stringify(rows, null, 2));
    return;
  }
  console.log();
  console.log(chalk.bold(`🧬 ${mutations.length} mutation(s)`));
  console.log();
  for (const mutation of mutations) console.log(`    ${formatMutationLine(mutation)}`);
  console.log();
}
