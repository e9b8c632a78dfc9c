import logger from '../../config/logger';
import { ValidationError } from '../../utils/errors';

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1', '[::1]', '0.0.0.0']);

export function isLoopbackHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return LOOPBACK_HOSTS.has(host) || /^127\.\d{1,3}\.\d{1,3}\.\d{1,3}$/.test(host);
}

export interface RewriteOptions {
  /** Base URL the download client can reach the indexer proxy on. */
  baseUrl: string | null;
  /** Pass loopback references through untouched (client shares the network namespace). */
  allowLoopback: boolean;
}

/**
 * Rewrite a download reference whose host is a loopback address onto a base the
 * download client can reach. Magnet links and non-loopback URLs are returned
 * unchanged, so applying the rewrite twice gives the same result as once.
 */
export function rewriteLoopbackReference(reference: string, options: RewriteOptions): string {
  if (reference.toLowerCase().startsWith('magnet:')) {
    return reference;
  }

  let url: URL;
  try {
    url = new URL(reference);
  } catch {
    throw new ValidationError(`Download reference is not a valid URL: ${reference.slice(0, 80)}`);
  }

  if (!isLoopbackHost(url.hostname)) {
    return reference;
  }

  if (options.allowLoopback) {
    return reference;
  }

  if (!options.baseUrl) {
    throw new ValidationError(
      `Download reference points at ${url.host}, which the download client cannot reach; set INDEXER_DOWNLOAD_BASE_URL`,
    );
  }

  const base = new URL(options.baseUrl);
  const basePath = base.pathname.replace(/\/$/, '');
  const rewritten = new URL(reference);
  rewritten.protocol = base.protocol;
  rewritten.hostname = base.hostname;
  rewritten.port = base.port;
  if (basePath && !url.pathname.startsWith(`${basePath}/`)) {
    rewritten.pathname = `${basePath}${url.pathname}`;
  }

  const result = rewritten.toString();
  logger.info(`[AddressRewrite] ${url.origin} -> ${base.origin} for ${url.pathname}`);
  return result;
}
