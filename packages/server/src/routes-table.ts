/** A plugin router mounted on the shared server. */
export interface MountedRoute {
  plugin: string;
  prefix: string;
  path: string;
}

const HEADERS = ['Plugin', 'Prefix', 'Path'] as const;

/**
 * Render mounted routes as a column-aligned table, sorted by plugin name.
 */
export function formatRoutesTable(routes: readonly MountedRoute[]): string {
  if (routes.length === 0) return 'No routes were registered.';

  const rows = [...routes]
    .sort((a, b) => a.plugin.localeCompare(b.plugin))
    .map((route): string[] => [route.plugin, route.prefix, route.path]);

  const widths = HEADERS.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => row[column].length)),
  );
  const line = (cells: readonly string[]) =>
    cells.map((cell, column) => cell.padEnd(widths[column])).join(' | ').trimEnd();

  return [line(HEADERS), line(widths.map((width) => '-'.repeat(width))), ...rows.map(line)].join(
    '\n',
  );
}
