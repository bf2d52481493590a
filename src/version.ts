/**
 * Centralized version management.
 *
 * All version references should import from this module rather than
 * hardcoding the version string.
 */

import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { readFileSync } from 'fs';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Get the package version.
 *
 * Reads package.json one level above this module, which holds for both
 * src/ and dist/.
 */
function getPackageVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  try {
    const moduleDir = dirname(fileURLToPath(import.meta.url));
    const raw: unknown = JSON.parse(readFileSync(join(moduleDir, '..', 'package.json'), 'utf-8'));
    return packageJsonSchema.parse(raw).version;
  } catch {
    // Fallback version - should match package.json
    return '0.1.0';
  }
}

/**
 * The current toolscope version.
 */
export const VERSION = getPackageVersion();

/**
 * Package name.
 */
export const PACKAGE_NAME = 'toolscope';

/**
 * Client identity sent during the MCP handshake and as the HTTP User-Agent.
 */
export const CLIENT_INFO = {
  name: PACKAGE_NAME,
  version: VERSION,
} as const;

export const USER_AGENT = `${PACKAGE_NAME}/${VERSION}`;
