/**
 * Element labels from an acquisition method's `.FIN2` export.
 *
 * The export is comma-separated text; line 8 holds the measured isotopes,
 * one per mass, after a leading row label:
 *
 *   Elements,Li7,Be9,B11
 */

const ELEMENT_LINE = 8;

export const ELEMENT_LIST_SUFFIX = '.FIN2';

export function parseElementList(content: string): string[] | null {
  const lines = content.split(/\r?\n/);
  if (lines.length < ELEMENT_LINE) return null;
  const line = lines[ELEMENT_LINE - 1]!.trim();
  if (line.length === 0) return null;
  return line.split(',').slice(1).map(label => label.trim());
}
