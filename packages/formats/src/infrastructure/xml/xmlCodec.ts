import { formatCell } from '../../domain/services/TypeInference.js';

/** One record element: attributes and child text, keyed by name, in document order. */
export type XmlRecord = Map<string, string | null>;

const NAME = '[a-zA-Z_][\\w.-]*';
const NAME_PATTERN = new RegExp(`^${NAME}$`);

/**
 * Lightweight regex-based reader for flat XML: a root element holding
 * repeated record elements whose children are scalar fields.
 *
 * ```xml
 * <data>
 *   <row id="1"><name>Ada</name><team/></row>
 * </data>
 * ```
 *
 * Attributes of the record element become fields too. Nested elements are
 * flattened to their text content. Empty elements read as `null`.
 */
export function parseXmlRecords(content: string, recordTag?: string): XmlRecord[] {
  const trimmed = stripProlog(content.trim());
  if (trimmed === '') return [];

  const tag = recordTag ?? detectRecordTag(trimmed);
  if (!tag) {
    throw new Error('could not detect the record element; set recordTag');
  }

  const recordRegex = new RegExp(`<${escapeRegExp(tag)}(\\s[^>]*?)?(?:/>|>([\\s\\S]*?)</${escapeRegExp(tag)}>)`, 'g');
  const records: XmlRecord[] = [];
  let match: RegExpExecArray | null;

  while ((match = recordRegex.exec(trimmed)) !== null) {
    const record: XmlRecord = new Map();
    parseAttributes(match[1] ?? '', record);
    parseFields(match[2] ?? '', record);
    records.push(record);
  }
  return records;
}

function stripProlog(content: string): string {
  return content.replace(/<\?[\s\S]*?\?>/g, '').replace(/<!--[\s\S]*?-->/g, '').trim();
}

function detectRecordTag(content: string): string | null {
  const rootMatch = new RegExp(`<(${NAME})[^>]*>`).exec(content);
  const rootTag = rootMatch?.[1];
  if (!rootTag) return null;

  const childRegex = new RegExp(`<${escapeRegExp(rootTag)}[^>]*>[\\s\\S]*?<(${NAME})[^>]*>`);
  return childRegex.exec(content)?.[1] ?? null;
}

function parseAttributes(source: string, record: XmlRecord): void {
  const attributeRegex = new RegExp(`(${NAME})\\s*=\\s*(?:"([^"]*)"|'([^']*)')`, 'g');
  let match: RegExpExecArray | null;
  while ((match = attributeRegex.exec(source)) !== null) {
    const key = match[1];
    if (key !== undefined) {
      record.set(key, decodeXmlEntities(match[2] ?? match[3] ?? ''));
    }
  }
}

function parseFields(innerXml: string, record: XmlRecord): void {
  const fieldRegex = new RegExp(`<(${NAME})(?:\\s[^>]*?)?(?:/>|>([\\s\\S]*?)</\\1>)`, 'g');
  let match: RegExpExecArray | null;
  while ((match = fieldRegex.exec(innerXml)) !== null) {
    const key = match[1];
    if (key === undefined || record.has(key)) continue;
    const text = stripTags(match[2] ?? '').trim();
    record.set(key, text === '' ? null : decodeXmlEntities(text));
  }
}

function stripTags(xml: string): string {
  return xml.replace(/<[^>]*>/g, '');
}

function decodeXmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&#x([0-9a-f]+);/gi, (_, code: string) => String.fromCodePoint(parseInt(code, 16)))
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
}

export function encodeXmlEntities(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export interface XmlRenderOptions {
  readonly rootName: string;
  readonly rowName: string;
  readonly xmlDeclaration: boolean;
  readonly encoding: string;
  readonly pretty: boolean;
}

/** Render rows as `<root><row><col>value</col>...</row>...</root>`. Nulls become empty elements. */
export function renderXml(
  columns: readonly string[],
  rows: readonly (readonly unknown[])[],
  options: XmlRenderOptions,
): string {
  for (const name of [options.rootName, options.rowName, ...columns]) {
    if (!NAME_PATTERN.test(name)) {
      throw new Error(`'${name}' is not a valid XML element name`);
    }
  }

  const newline = options.pretty ? '\n' : '';
  const indent = (depth: number): string => (options.pretty ? '  '.repeat(depth) : '');
  const lines: string[] = [];

  if (options.xmlDeclaration) {
    lines.push(`<?xml version='1.0' encoding='${options.encoding}'?>`);
  }
  lines.push(`<${options.rootName}>`);
  for (const row of rows) {
    lines.push(`${indent(1)}<${options.rowName}>`);
    columns.forEach((name, i) => {
      const value = row[i];
      lines.push(
        value === null || value === undefined
          ? `${indent(2)}<${name}/>`
          : `${indent(2)}<${name}>${encodeXmlEntities(formatCell(value))}</${name}>`,
      );
    });
    lines.push(`${indent(1)}</${options.rowName}>`);
  }
  lines.push(`</${options.rootName}>`);

  return lines.join(newline) + newline;
}
