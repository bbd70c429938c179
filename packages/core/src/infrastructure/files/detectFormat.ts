const EXTENSION_FORMATS: Readonly<Record<string, string>> = {
  csv: 'csv',
  json: 'json',
  yaml: 'yaml',
  yml: 'yaml',
  xml: 'xml',
  html: 'html',
  htm: 'html',
  msgpack: 'msgpack',
  mp: 'msgpack',
  feather: 'feather',
  arrow: 'feather',
  parquet: 'parquet',
  pq: 'parquet',
};

/** Detect a format identifier from a file name or path based on its extension. Returns `null` when unknown. */
export function detectFormat(fileNameOrPath: string): string | null {
  const base = fileNameOrPath.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return null;
  const ext = base.slice(dot + 1).toLowerCase();
  return EXTENSION_FORMATS[ext] ?? null;
}
