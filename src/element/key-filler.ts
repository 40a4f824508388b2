import type { Inputs } from '../types.js';

const PLACEHOLDERS: ReadonlyArray<[RegExp, string]> = [
  [/mail/i, 'cookieprobe@example.com'],
  [/pass|pwd/i, 'test-password'],
  [/user|login/i, 'cookieprobe_user'],
  [/name/i, 'cookieprobe_name'],
  [/url|link|site|web/i, 'http://www.example.com'],
  [/date/i, '2012-10-02'],
  [/phone|tel|zip|code|num|id$|qty|count|age|year/i, '132'],
];

export const DEFAULT_PLACEHOLDER = '1';

/** Gives every empty input a placeholder picked by its name; filled inputs are kept. */
export function fillInputs(inputs: Inputs): Inputs {
  const filled: Inputs = {};
  for (const [name, value] of Object.entries(inputs)) {
    if (value) {
      filled[name] = value;
      continue;
    }
    const match = PLACEHOLDERS.find(([pattern]) => pattern.test(name));
    filled[name] = match ? match[1] : DEFAULT_PLACEHOLDER;
  }
  return filled;
}
