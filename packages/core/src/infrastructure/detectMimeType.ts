const MIME_TYPES: Readonly<Record<string, string>> = {
  csv: 'text/csv',
  tsv: 'text/tab-separated-values',
  json: 'application/json',
  ndjson: 'application/x-ndjson',
  jsonl: 'application/x-ndjson',
};

/** MIME type from a file name's extension. Unknown extensions are `text/plain`. */
export function detectMimeType(fileNameOrPath: string): string {
  const dot = fileNameOrPath.lastIndexOf('.');
  if (dot < 0) return 'text/plain';
  return MIME_TYPES[fileNameOrPath.slice(dot + 1).toLowerCase()] ?? 'text/plain';
}
