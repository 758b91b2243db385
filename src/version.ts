import { createRequire } from 'node:module';

const require = createRequire(import.meta.url);
const packageJson: unknown = require('../package.json');

function versionOf(manifest: unknown): string | null {
  if (manifest && typeof manifest === 'object' && 'version' in manifest) {
    const { version } = manifest;
    return typeof version === 'string' && version.length > 0 ? version : null;
  }
  return null;
}

const resolvedVersion = versionOf(packageJson);

if (!resolvedVersion) {
  throw new Error('Unable to determine mdblock version.');
}

export const MDBLOCK_VERSION = resolvedVersion;
