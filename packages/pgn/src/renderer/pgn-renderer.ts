/**
 * A PGN tag pair, rendered in array order
 */
export type TagPair = readonly [name: string, value: string];

/**
 * Render a PGN tag section, one `[Name "value"]` per line
 */
export function renderTags(tags: readonly TagPair[]): string {
  return tags.map(([name, value]) => renderTag(name, value)).join('\n');
}

/**
 * Render a single PGN tag
 */
export function renderTag(name: string, value: string): string {
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return `[${name} "${escaped}"]`;
}

const MOVE_NUMBER = /^\d+\.+$/;

/**
 * Greedy-wrap move text at `width` columns, breaking only between units.
 *
 * A unit is a move with its number indicator, a `{...}` comment or a
 * balanced `(...)` variation. A unit longer than `width` gets a line of its
 * own. A width of 0 or less leaves the text on one line.
 */
export function wrapMoveText(text: string, width: number): string {
  if (width <= 0) {
    return text;
  }

  const lines: string[] = [];
  let current = '';
  for (const unit of moveTextUnits(text)) {
    if (current !== '' && current.length + 1 + unit.length > width) {
      lines.push(current);
      current = unit;
    } else {
      current = current === '' ? unit : `${current} ${unit}`;
    }
  }
  if (current !== '') {
    lines.push(current);
  }
  return lines.join('\n');
}

/**
 * Split move text into the units `wrapMoveText` keeps on one line
 */
function moveTextUnits(text: string): string[] {
  const units: string[] = [];
  let pendingNumber = '';
  let pos = 0;

  while (pos < text.length) {
    const ch = text.charAt(pos);
    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    let end: number;
    if (ch === '{') {
      end = closingBrace(text, pos);
    } else if (ch === '(') {
      end = closingParen(text, pos);
    } else {
      end = pos;
      while (end < text.length && !/[\s{(]/.test(text.charAt(end))) {
        end++;
      }
    }

    const unit = text.slice(pos, end);
    pos = end;
    if (MOVE_NUMBER.test(unit)) {
      pendingNumber = pendingNumber === '' ? unit : `${pendingNumber} ${unit}`;
    } else {
      units.push(pendingNumber === '' ? unit : `${pendingNumber} ${unit}`);
      pendingNumber = '';
    }
  }

  if (pendingNumber !== '') {
    units.push(pendingNumber);
  }
  return units;
}

/** Index just past the `}` closing the comment at `start`, or the text end */
function closingBrace(text: string, start: number): number {
  const close = text.indexOf('}', start);
  return close === -1 ? text.length : close + 1;
}

/** Index just past the `)` balancing the one at `start`, or the text end */
function closingParen(text: string, start: number): number {
  let depth = 0;
  let pos = start;
  while (pos < text.length) {
    const ch = text.charAt(pos);
    if (ch === '{') {
      pos = closingBrace(text, pos);
      continue;
    }
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth--;
      if (depth === 0) {
        return pos + 1;
      }
    }
    pos++;
  }
  return text.length;
}
