/**
 * XML well-formedness check
 *
 * cheerio recovers from broken markup, so documents are validated before
 * they are queried.
 */

import { XMLValidator } from 'fast-xml-parser';

/**
 * Describe why a document is not well-formed, or undefined when it is
 */
export function xmlSyntaxError(xml: string): string | undefined {
  const result = XMLValidator.validate(xml);
  if (result === true) {
    return undefined;
  }
  const { msg, line, col } = result.err;
  return `${msg} (line ${line}, column ${col})`;
}

/**
 * Make text safe to place inside `<!-- ... -->`
 *
 * A comment may not contain `--`, so each such pair is split with a space.
 */
export function escapeXmlComment(text: string): string {
  let escaped = text;
  while (escaped.includes('--')) {
    escaped = escaped.replace(/--/g, '- -');
  }
  return escaped;
}
