/**
 * URL path builders for the Airtable REST API.
 *
 * Every segment is percent-encoded, so table names with spaces or slashes
 * are safe to pass.
 */

export function tablePath(baseId: string, tableIdOrName: string): string {
  return `/${encodeURIComponent(baseId)}/${encodeURIComponent(tableIdOrName)}`;
}

export function recordPath(baseId: string, tableIdOrName: string, recordId: string): string {
  return `${tablePath(baseId, tableIdOrName)}/${encodeURIComponent(recordId)}`;
}

export function metaTablesPath(baseId: string): string {
  return `/meta/bases/${encodeURIComponent(baseId)}/tables`;
}

export const META_BASES_PATH = '/meta/bases';
