// ============================================================
// Input splitting
// ============================================================

/**
 * Split input text into lines.
 * A trailing newline does not produce an extra empty line, and CRLF endings are accepted.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map(stripCarriageReturn);
}

export function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Resolve an index that may count from the end (-1 is the last item).
 * Returns undefined when out of range.
 */
export function resolveIndex(index: number, length: number): number | undefined {
  const resolved = index < 0 ? index + length : index;
  if (resolved < 0 || resolved >= length || !Number.isInteger(resolved)) {
    return undefined;
  }
  return resolved;
}

// ============================================================
// CSV
// ============================================================

/**
 * Split one CSV record into fields.
 * Double quotes delimit fields that contain the separator; `""` inside quotes is a literal quote.
 */
export function splitCsvLine(line: string, separator = ','): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuote = false;
  let i = 0;

  while (i < line.length) {
    const ch = line[i];
    if (inQuote) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i += 2;
          continue;
        }
        inQuote = false;
        i++;
        continue;
      }
      current += ch;
      i++;
      continue;
    }
    if (ch === '"') {
      inQuote = true;
      i++;
      continue;
    }
    if (line.startsWith(separator, i)) {
      fields.push(current);
      current = '';
      i += separator.length;
      continue;
    }
    current += ch;
    i++;
  }

  fields.push(current);
  return fields;
}

/** Quote a field for CSV output when it contains the separator, a quote or a tab */
export function quoteCsvField(field: string, separator = ','): string {
  if (field.includes(separator) || field.includes('"') || field.includes('\t')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
