const LAST_TWO_SEGMENTS = /\/([^/]+)\/([^/]+)$/;

/**
 * Short window label for a path: the first four characters of the parent
 * segment, a slash, and the last segment (`/home/alice/code/app` → `code/app`).
 * Paths with fewer than two segments are returned unchanged.
 */
export function paneName(path: string): string {
  const match = LAST_TWO_SEGMENTS.exec(path);
  if (!match) {
    return path;
  }
  const [, parent = '', leaf = ''] = match;
  return `${Array.from(parent).slice(0, 4).join('')}/${leaf}`;
}

/** tmux treats `.` in a target as a window/pane separator, so session names drop it. */
export function sessionName(pane: string): string {
  return pane.replaceAll('.', '');
}
