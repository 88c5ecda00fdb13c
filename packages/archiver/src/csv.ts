/** RFC 4180 reader. Tolerates a UTF-8 BOM, CRLF line ends and a missing final newline. */
export function parseCsv(text: string): string[][] {
  const src = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    if (row.length > 1 || row[0] !== '') rows.push(row);
    row = [];
  };

  while (i < src.length) {
    const ch = src[i];
    if (quoted) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i += 1;
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      endField();
    } else if (ch === '\n') {
      endRow();
    } else if (ch === '\r') {
      if (src[i + 1] === '\n') i += 1;
      endRow();
    } else {
      field += ch;
    }
    i += 1;
  }
  if (field !== '' || row.length > 0) endRow();

  return rows;
}

/** Header-keyed records numbered from 2, the header being row 1. */
export function csvRecords(text: string): Array<{ row: number; values: Record<string, string> }> {
  const [header, ...body] = parseCsv(text);
  if (!header) return [];
  const columns = header.map((h) => h.trim());
  return body.map((cells, idx) => {
    const values: Record<string, string> = {};
    columns.forEach((c, j) => {
      values[c] = cells[j] ?? '';
    });
    return { row: idx + 2, values };
  });
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/** Every field quoted. */
export function toQuotedCsv(rows: Array<Record<string, string>>, columns: string[]): string {
  const header = columns.map(quote).join(',');
  const body = rows.map((row) => columns.map((c) => quote(row[c] ?? '')).join(','));
  return [header, ...body].join('\n') + '\n';
}
