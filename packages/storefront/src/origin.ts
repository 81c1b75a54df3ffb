import { PreconditionFailedError, errorMessage } from '@collector/shared';

function parseShopUrl(shopUrl: string): URL {
  const trimmed = shopUrl.trim();
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(withScheme);
  } catch (error) {
    throw new PreconditionFailedError(`Invalid shop URL "${shopUrl}": ${errorMessage(error)}`);
  }
}

/**
 * Scheme and host of a configured shop URL. Catalog requests always go to the
 * store root, even when the configured URL points at a collection page.
 *
 * @example storeOrigin('https://shop.example/collections/all') // 'https://shop.example'
 */
export function storeOrigin(shopUrl: string): string {
  return parseShopUrl(shopUrl).origin;
}

/** Hostname for log lines and error messages. */
export function storeDomain(shopUrl: string): string {
  return parseShopUrl(shopUrl).host;
}
