import type { PathMapping } from '../../config/settings';

/**
 * Translate a path as the download client sees it into the local one. The
 * longest matching remote prefix wins; unmatched paths pass through.
 */
export function mapClientPath(clientPath: string, mappings: readonly PathMapping[]): string {
  const normalized = clientPath.replace(/\\/g, '/');
  const match = [...mappings]
    .sort((a, b) => b.remote.length - a.remote.length)
    .find(({ remote }) => {
      const prefix = remote.replace(/\\/g, '/').replace(/\/+$/, '');
      return normalized === prefix || normalized.startsWith(`${prefix}/`);
    });

  if (!match) return clientPath;
  const prefix = match.remote.replace(/\\/g, '/').replace(/\/+$/, '');
  return `${match.local.replace(/\/+$/, '')}${normalized.slice(prefix.length)}`;
}
