/**
 * Six-way Venn diagram templating
 *
 * The diagram SVG labels each region with a text node whose content is the
 * letter code of that region, e.g. `<text x="310.5" y="212.25">abd</text>`.
 * Rendering swaps each code for its agreement probability and leaves every
 * other line as it was.
 */

import { readFile } from 'node:fs/promises';
import { EmmError, ErrorCode, wrapError } from '../core/errors';

/** y coordinate, then a code of letters a-f closing with `</` */
export const VENN_CODE_PATTERN = /(y="[0-9]+\.[0-9]+">)([a-f]+)(?=<\/)/;

export const DEFAULT_DIGITS = 6;

export type ProbabilityLookup = (code: string) => number;

export function formatProbability(value: number, digits: number = DEFAULT_DIGITS): string {
  return value.toFixed(digits);
}

/**
 * Replace the code on one line, if it carries one
 */
export function renderVennLine(
  line: string,
  lookup: ProbabilityLookup,
  digits: number = DEFAULT_DIGITS
): string {
  return line.replace(
    VENN_CODE_PATTERN,
    (_match, prefix: string, code: string) => `${prefix}${formatProbability(lookup(code), digits)}`
  );
}

/**
 * Render a whole template. Lines come back joined with `\n`.
 */
export function renderVennDiagram(
  template: string,
  lookup: ProbabilityLookup,
  digits: number = DEFAULT_DIGITS
): string {
  return template
    .split(/\r?\n/)
    .map((line) => renderVennLine(line, lookup, digits))
    .join('\n');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Read a template from disk
 */
export async function loadVennTemplate(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new EmmError(ErrorCode.RESOURCE_NOT_FOUND, `Venn template not found: ${path}`, {
        path,
      });
    }
    throw wrapError(error, ErrorCode.IO_ERROR, { path });
  }
}
