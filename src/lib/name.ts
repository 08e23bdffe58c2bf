/**
 * Turn a repo or branch name into a fragment usable in a directory name and a
 * tmux session name: path separators, dots, colons and whitespace become hyphens.
 */
export function slugify(raw: string): string {
  return raw
    .trim()
    .replace(/[\x00-\x1f\x7f]+/g, '')
    .replace(/[\s/\\.:~^?*[\]@{}<>]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** Repository name derived from a clone URL or path: last segment, minus `.git`. */
export function repoNameFromUrl(url: string): string {
  let clean = url.trim().replace(/\/+$/, '');
  if (clean.endsWith('.git')) clean = clean.slice(0, -4);
  const lastSep = Math.max(clean.lastIndexOf('/'), clean.lastIndexOf(':'));
  return clean.slice(lastSep + 1);
}
