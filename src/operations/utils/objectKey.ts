/**
 * Drop `count` leading path segments from an archive entry name.
 *
 * Leading slashes and empty segments are ignored; a `.` segment counts toward
 * `count` (as with `tar --strip-components`) but is removed from what remains.
 * Returns null when nothing is left.
 */
export function stripComponents(name: string, count: number): string | null {
  const segments = name.split('/').filter(segment => segment !== '')
  const remaining = segments.slice(count).filter(segment => segment !== '.')
  return remaining.length > 0 ? remaining.join('/') : null
}

/**
 * True when a path climbs out of its root through a `..` segment
 */
export function hasParentSegment(path: string): boolean {
  return path.split('/').includes('..')
}

/**
 * Join a key prefix and a path with a single `/`
 */
export function objectKey(prefix: string, path: string): string {
  const base = prefix.replace(/\/+$/, '')
  return base ? `${base}/${path}` : path
}
