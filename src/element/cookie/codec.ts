const UNSAFE = /[+;%=\0]/g;
const ESCAPED_RUN = /(?:%[0-9a-fA-F]{2})+/g;

function escapeChar(char: string): string {
  return '%' + char.charCodeAt(0).toString(16).toUpperCase().padStart(2, '0');
}

/**
 * Prepares a string for the `Cookie` request header: `+ ; % =` and NUL are
 * percent-escaped, spaces become `+`.
 */
export function encode(str: string): string {
  return str.replace(UNSAFE, escapeChar).replace(/ /g, '+');
}

function decodeRun(run: string): string {
  const bytes = Buffer.from(run.replace(/%/g, ''), 'hex');
  const text = bytes.toString('utf-8');
  // bytes that are not UTF-8 would come back as U+FFFD
  return Buffer.from(text, 'utf-8').equals(bytes) ? text : run;
}

/**
 * Reverses {@link encode}. Consecutive escapes are decoded together so
 * multi-byte UTF-8 sequences come back whole. Malformed escapes, and runs
 * that are not valid UTF-8, stay as written.
 */
export function decode(str: string): string {
  return str
    .replace(/\+/g, ' ')
    .replace(ESCAPED_RUN, decodeRun);
}
