/**
 * Launch Arguments
 *
 * The shell page is opened as `index.html?url=<address>&website-version=<n>`
 * by whatever starts the browser (desktop wrapper, bookmark, command line).
 * `address` and `version` are accepted as shorter aliases.
 */

import type { LaunchArgs } from '../types/dweb';

const ADDRESS_PARAMS = ['url', 'address'];
const VERSION_PARAMS = ['website-version', 'version'];

function firstParam(params: URLSearchParams, names: string[]): string | undefined {
  for (const name of names) {
    const value = params.get(name)?.trim();
    if (value) return value;
  }
  return undefined;
}

export function readLaunchArgs(search: string): LaunchArgs {
  const params = new URLSearchParams(search);
  const args: LaunchArgs = {};

  const address = firstParam(params, ADDRESS_PARAMS);
  if (address) {
    args.address = address;
  }

  const version = firstParam(params, VERSION_PARAMS);
  if (version !== undefined) {
    if (/^\d+$/.test(version)) {
      const parsed = Number(version);
      if (parsed > 0) args.version = parsed;
    } else {
      console.warn(`🚀 [Startup] Ignoring non-numeric launch version '${version}'`);
    }
  }

  return args;
}
