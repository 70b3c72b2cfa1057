/**
 * Render a finished result set as text, JSON or CSV
 */

import { extname } from 'path';
import type { HttpResponseInfo, OutputFormat, ResultSet, ScanResult } from './types.js';

export const CSV_HEADER = 'name,addresses,http_status,http_title';

/**
 * Guess the format from an output path: .json, .csv, anything else is text
 */
export function inferFormat(path: string): OutputFormat {
  switch (extname(path).toLowerCase()) {
    case '.json':
      return 'json';
    case '.csv':
      return 'csv';
    default:
      return 'text';
  }
}

/**
 * The response shown in single-response views: plain HTTP when it answered, else HTTPS.
 * Both stay available under `result.http`.
 */
export function primaryResponse(result: ScanResult): HttpResponseInfo | undefined {
  return result.http.http ?? result.http.https;
}

export function formatText(resultSet: ResultSet): string {
  return resultSet.results
    .map((result) => {
      const parts = [result.name];
      if (result.addresses.length > 0) parts.push(result.addresses.join(', '));

      const response = primaryResponse(result);
      if (response) parts.push(String(response.status));

      return parts.join(' — ');
    })
    .join('\n');
}

function responseJSON(response: HttpResponseInfo) {
  return {
    status: response.status,
    length: response.contentLength,
    title: response.title ?? null,
  };
}

export function formatJSON(resultSet: ResultSet): string {
  const rows = resultSet.results.map((result) => {
    const response = primaryResponse(result);
    return {
      name: result.name,
      addresses: result.addresses,
      http: response ? responseJSON(response) : null,
      schemes: Object.values(result.http)
        .filter((entry): entry is HttpResponseInfo => entry !== undefined)
        .map((entry) => ({ scheme: entry.scheme, url: entry.url, ...responseJSON(entry) })),
      discoveredAt: result.discoveredAt.toISOString(),
    };
  });
  return JSON.stringify(rows, null, 2);
}

/**
 * Quote a CSV field when it holds a delimiter, quote or line break
 */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCSV(resultSet: ResultSet): string {
  const lines = [CSV_HEADER];
  for (const result of resultSet.results) {
    const response = primaryResponse(result);
    lines.push(
      [
        result.name,
        result.addresses.join(';'),
        response ? String(response.status) : '',
        response?.title ?? '',
      ]
        .map(csvField)
        .join(',')
    );
  }
  return lines.join('\n');
}

export function formatResults(resultSet: ResultSet, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJSON(resultSet);
    case 'csv':
      return formatCSV(resultSet);
    default:
      return formatText(resultSet);
  }
}
