/**
 * Site Address Parsing
 *
 * Addresses take the form `awx://<identifier>[/<path>][?v=<version>]`.
 * Users may type a bare identifier, in which case the scheme is assumed.
 */

import { DWEB_SCHEME, type DwebAddress, type ParseError, type ParseErrorCode, type ParseResult } from '../types/dweb';
import { DWEB_CONFIG } from '../config/dweb.config';

const SCHEME_SEPARATOR = '://';

function parseError(code: ParseErrorCode, message: string): { ok: false; error: ParseError } {
  return { ok: false, error: { kind: 'parse', code, message } };
}

/**
 * Read the `v` query value.
 * Missing, empty and zero all mean "latest" and come back as undefined.
 */
function parseVersionParam(value: string | null): { ok: true; version?: number } | { ok: false } {
  if (value === null || value === '') {
    return { ok: true };
  }
  if (!/^\d+$/.test(value)) {
    return { ok: false };
  }
  const version = Math.min(Number(value), Number.MAX_SAFE_INTEGER);
  return { ok: true, version: version === 0 ? undefined : version };
}

/**
 * Parse user or launch input into a structured address.
 *
 * @example
 * parseDwebAddress('abc?v=2')
 * // { ok: true, address: { scheme: 'awx', identifier: 'abc', path: '/', requestedVersion: 2 } }
 */
export function parseDwebAddress(raw: string): ParseResult {
  const input = raw.trim();
  const withScheme = input.includes(SCHEME_SEPARATOR) ? input : `${DWEB_SCHEME}${SCHEME_SEPARATOR}${input}`;

  const schemeEnd = withScheme.indexOf(SCHEME_SEPARATOR);
  const scheme = withScheme.slice(0, schemeEnd).toLowerCase();
  if (scheme !== DWEB_SCHEME) {
    return parseError('unsupported-scheme', `Unsupported address scheme '${scheme}', expected '${DWEB_SCHEME}'`);
  }

  const afterScheme = withScheme.slice(schemeEnd + SCHEME_SEPARATOR.length);
  if (afterScheme === '' || /^[/?#]/.test(afterScheme)) {
    return parseError('empty-identifier', `Address has no site identifier: ${input}`);
  }

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return parseError('malformed', `Failed to parse address: ${input}`);
  }

  if (url.username || url.password || url.port) {
    return parseError('malformed', `Address must not carry credentials or a port: ${input}`);
  }
  if (!url.hostname) {
    return parseError('empty-identifier', `Address has no site identifier: ${input}`);
  }

  const version = parseVersionParam(url.searchParams.get(DWEB_CONFIG.VERSION_PARAM));
  if (!version.ok) {
    return parseError(
      'invalid-version',
      `Number expected for address parameter '${DWEB_CONFIG.VERSION_PARAM}': ${url.searchParams.get(DWEB_CONFIG.VERSION_PARAM)}`
    );
  }

  const address: DwebAddress = {
    scheme: DWEB_SCHEME,
    identifier: url.hostname,
    path: url.pathname || '/',
    ...(version.version !== undefined ? { requestedVersion: version.version } : {}),
  };
  return { ok: true, address };
}

/**
 * Canonical string for an address. Once a version has been resolved it is
 * always written out, so the address bar shows what was actually loaded.
 */
export function formatDwebAddress(address: DwebAddress, resolvedVersion?: number): string {
  const path = address.path === '/' ? '' : address.path;
  const version = resolvedVersion ?? address.requestedVersion;
  const query = version !== undefined && version > 0 ? `?${DWEB_CONFIG.VERSION_PARAM}=${version}` : '';
  return `${address.scheme}${SCHEME_SEPARATOR}${address.identifier}${path}${query}`;
}
