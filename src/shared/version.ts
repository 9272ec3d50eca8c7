// ============================================================================
// src/shared/version.ts
// ============================================================================

import { readFileSync } from 'node:fs';

interface PackageJson {
  readonly version?: string;
}

const readPackageJson = (): PackageJson => {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
  if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
    return { version: raw.version };
  }

  return {};
};

const { version = '0.0.0' } = readPackageJson();
const startupTimestamp = new Date();

export const versionInfo = {
  version,
  startedAt: startupTimestamp,
  startedAtIso: startupTimestamp.toISOString(),
} as const;
