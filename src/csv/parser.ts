export interface ParsedCsv {
  header: string[];
  rows: Record<string, string>[];
}

/**
 * Parses RFC 4180 CSV text. The first row is the header; blank lines are skipped and short rows are
 * padded with empty strings. Cells beyond the header width are dropped.
 */
export function parseCsv(text: string): ParsedCsv {
  const table = parseCsvTable(text.startsWith('\uFEFF') ? text.slice(1) : text);
  const [header, ...body] = table;
  if (!header) {
    return { header: [], rows: [] };
  }

  const rows = body.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((field, index) => {
      row[field] = cells[index] ?? '';
    });
    return row;
  });

  return { header, rows };
}

export function parseCsvTable(text: string): string[][] {
  const table: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let quoted = false;
  let rowHasContent = false;

  const endCell = () => {
    row.push(cell);
    cell = '';
  };
  const endRow = () => {
    endCell();
    if (rowHasContent) {
      table.push(row);
    }
    row = [];
    rowHasContent = false;
  };

  for (let index = 0; index < text.length; index += 1) {
    const char = text.charAt(index);

    if (quoted) {
      if (char === '"') {
        if (text.charAt(index + 1) === '"') {
          cell += '"';
          index += 1;
        } else {
          quoted = false;
        }
      } else {
        cell += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        quoted = true;
        rowHasContent = true;
        break;
      case ',':
        endCell();
        rowHasContent = true;
        break;
      case '\r':
        if (text.charAt(index + 1) === '\n') {
          index += 1;
        }
        endRow();
        break;
      case '\n':
        endRow();
        break;
      default:
        cell += char;
        rowHasContent = true;
    }
  }

  if (quoted) {
    throw new Error('Malformed CSV: unterminated quoted field.');
  }
  if (rowHasContent) {
    endRow();
  }

  return table;
}
