/**
 * bitforge version, read from the @bitforge/core package.json at load time.
 * Stamped into every generated Makefile header.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const packageDir = join(dirname(fileURLToPath(import.meta.url)), '..');

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(packageDir, 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const BITFORGE_VERSION: string = readVersion();
