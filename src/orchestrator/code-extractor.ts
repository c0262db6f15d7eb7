/**
 * Pulls executable code out of a model response
 */

const FENCED_BLOCK = /```[\w+-]*[^\S\n]*\n([\s\S]*?)```/;

/**
 * Return the body of the first fenced block, or the whole response with any
 * stray leading/trailing fence lines removed
 */
export function extractCode(response: string): string {
  const fenced = FENCED_BLOCK.exec(response);
  if (fenced?.[1] !== undefined) {
    return fenced[1].trim();
  }

  return response
    .trim()
    .replace(/^```[\w+-]*[^\S\n]*\n?/, '')
    .replace(/\n?```$/, '')
    .trim();
}

/**
 * Loader snippet first, then the generated analysis
 */
export function composeProgram(preamble: string, code: string): string {
  const head = preamble.trim();
  if (!head) {
    return `${code}\n`;
  }
  return `${head}\n\n${code}\n`;
}
