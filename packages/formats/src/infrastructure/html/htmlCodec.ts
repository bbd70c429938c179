import { formatCell } from '../../domain/services/TypeInference.js';
import { encodeXmlEntities } from '../xml/xmlCodec.js';

/** Text content of one `<table>`: optional header cells and body rows. */
export interface HtmlTable {
  readonly head: readonly string[] | null;
  readonly rows: readonly (readonly string[])[];
}

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * Extract the tables of an HTML document, in document order.
 *
 * Rows come from `<tr>` elements and cells from `<th>`/`<td>`. When a
 * `<thead>` is present its last row is the header; otherwise `head` is `null`
 * and the caller decides. Nested tables are not supported.
 */
export function parseHtmlTables(html: string): HtmlTable[] {
  const tables: HtmlTable[] = [];
  const tableRegex = /<table\b[^>]*>([\s\S]*?)<\/table>/gi;
  let match: RegExpExecArray | null;

  while ((match = tableRegex.exec(html)) !== null) {
    const inner = match[1] ?? '';
    const theadMatch = /<thead\b[^>]*>([\s\S]*?)<\/thead>/i.exec(inner);
    const headRows = theadMatch ? parseRows(theadMatch[1] ?? '') : [];
    const bodySource = theadMatch ? inner.replace(theadMatch[0], '') : inner;

    tables.push({
      head: headRows.at(-1) ?? null,
      rows: parseRows(bodySource),
    });
  }
  return tables;
}

function parseRows(source: string): string[][] {
  const rows: string[][] = [];
  const rowRegex = /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi;
  let rowMatch: RegExpExecArray | null;

  while ((rowMatch = rowRegex.exec(source)) !== null) {
    const cells: string[] = [];
    const cellRegex = /<(td|th)\b[^>]*>([\s\S]*?)<\/\1>/gi;
    let cellMatch: RegExpExecArray | null;
    while ((cellMatch = cellRegex.exec(rowMatch[1] ?? '')) !== null) {
      cells.push(cellText(cellMatch[2] ?? ''));
    }
    rows.push(cells);
  }
  return rows;
}

function cellText(html: string): string {
  return decodeHtmlEntities(html.replace(/<br\s*\/?>/gi, ' ').replace(/<[^>]*>/g, ''))
    .replace(/\s+/g, ' ')
    .trim();
}

function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) return String.fromCodePoint(parseInt(body.slice(2), 16));
    if (body.startsWith('#')) return String.fromCodePoint(Number(body.slice(1)));
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/** Visible text of a table, used by the reader's `match` filter. */
export function tableText(table: HtmlTable): string {
  return [...(table.head ?? []), ...table.rows.flat()].join(' ');
}

export interface HtmlRenderOptions {
  readonly border: number;
  readonly classes: readonly string[];
  readonly tableId?: string;
  readonly header: boolean;
  readonly naRep: string;
}

/** Render a `<table>` in the layout dataframe tooling emits. */
export function renderHtmlTable(
  columns: readonly string[],
  rows: readonly (readonly unknown[])[],
  options: HtmlRenderOptions,
): string {
  const classes = ['dataframe', ...options.classes.filter((name) => name !== 'dataframe')];
  const idAttribute = options.tableId === undefined ? '' : ` id="${encodeXmlEntities(options.tableId)}"`;
  const lines: string[] = [`<table border="${String(options.border)}" class="${encodeXmlEntities(classes.join(' '))}"${idAttribute}>`];

  if (options.header) {
    lines.push('  <thead>', '    <tr style="text-align: right;">');
    for (const name of columns) {
      lines.push(`      <th>${encodeXmlEntities(name)}</th>`);
    }
    lines.push('    </tr>', '  </thead>');
  }

  lines.push('  <tbody>');
  for (const row of rows) {
    lines.push('    <tr>');
    columns.forEach((_, i) => {
      lines.push(`      <td>${encodeXmlEntities(formatCell(row[i], options.naRep))}</td>`);
    });
    lines.push('    </tr>');
  }
  lines.push('  </tbody>', '</table>');

  return lines.join('\n') + '\n';
}
