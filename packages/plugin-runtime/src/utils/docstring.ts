/**
 * Documentation string helpers
 */

const TAB_SIZE = 8;

function expandTabs(line: string): string {
  let column = 0;
  let out = '';
  for (const char of line) {
    if (char === '\t') {
      const spaces = TAB_SIZE - (column % TAB_SIZE);
      out += ' '.repeat(spaces);
      column += spaces;
    } else {
      out += char;
      column += 1;
    }
  }
  return out;
}

/**
 * Normalize an indented documentation string.
 *
 * The first line is stripped; the common leading indentation of the other
 * lines is removed; leading and trailing blank lines are dropped.
 */
export function trimDocstring(doc: string | undefined): string {
  if (!doc) {
    return '';
  }

  const lines = doc.split(/\r\n|\r|\n/).map(expandTabs);

  let indent = Number.POSITIVE_INFINITY;
  for (const line of lines.slice(1)) {
    const stripped = line.trimStart();
    if (stripped) {
      indent = Math.min(indent, line.length - stripped.length);
    }
  }

  const trimmed = [lines[0]?.trim() ?? ''];
  if (indent < Number.POSITIVE_INFINITY) {
    for (const line of lines.slice(1)) {
      trimmed.push(line.slice(indent).trimEnd());
    }
  }

  while (trimmed.length > 0 && !trimmed[trimmed.length - 1]) {
    trimmed.pop();
  }
  while (trimmed.length > 0 && !trimmed[0]) {
    trimmed.shift();
  }

  return trimmed.join('\n');
}

/**
 * Title and description of a documentation string: the first line, and the
 * rest of the text.
 */
export function splitDocstring(doc: string | undefined): { title: string; description: string } {
  const trimmed = trimDocstring(doc);
  const newline = trimmed.indexOf('\n');
  if (newline === -1) {
    return { title: trimmed.trim(), description: NO_DESCRIPTION };
  }
  return {
    title: trimmed.slice(0, newline).trim(),
    description: trimmed.slice(newline + 1).trim(),
  };
}

export const NO_DESCRIPTION = 'no description available';
