/** Renders a path as a JSON pointer fragment; the root is `#`. */
export function toJsonPointer(path: ReadonlyArray<string | number>): string {
  return '#' + path
    .map((segment) => '/' + String(segment).replace(/~/g, '~0').replace(/\//g, '~1'))
    .join('');
}
