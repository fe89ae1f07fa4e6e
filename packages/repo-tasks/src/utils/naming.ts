/**
 * Module name helpers.
 */

/** Last dot-separated segment: "MyApp.Repo" -> "Repo" */
export function lastSegment(name: string): string {
  const segments = name.split('.');
  return segments[segments.length - 1] ?? name;
}

/**
 * Convert a CamelCase module segment to snake_case.
 * "ReadOnlyRepo" -> "read_only_repo", "HTTPRepo" -> "http_repo"
 */
export function underscore(value: string): string {
  return value
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/([a-z\d])([A-Z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

/** Double-quote a string, escaping backslashes and quotes. */
export function quote(value: string): string {
  return JSON.stringify(value);
}
