import Papa from 'papaparse';

/**
 * Split one NEM12 line into its comma-separated fields. Quoted fields are unquoted.
 * The row separator is pinned to `\n`, which a line never contains, so a stray
 * `\r` stays inside its field instead of starting a new row.
 */
export function splitFields(line: string): string[] {
  const result = Papa.parse<string[]>(line, {
    delimiter: ',',
    newline: '\n',
    header: false,
    skipEmptyLines: false,
    dynamicTyping: false,
  });

  return result.data[0] ?? [];
}
