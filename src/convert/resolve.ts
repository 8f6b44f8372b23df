import { promises as fs, constants } from 'fs';
import path from 'path';
import { ConverterNotFoundError } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('convert:resolve');

/** Executable names looked up on the search path, in order */
const BINARY_NAMES = ['libreoffice', 'soffice'];

/** Locations tried when nothing is found on the search path */
const DEFAULT_FALLBACKS = [
  '/Applications/LibreOffice.app/Contents/MacOS/soffice',
  '/Applications/LibreOffice.app/Contents/MacOS/soffice-bin',
];

export interface ResolveOptions {
  /** Explicit executable path (LIBREOFFICE_BIN); authoritative when set */
  explicitPath?: string;
  /** PATH-style list of directories (default: process.env.PATH) */
  searchPath?: string;
  fallbacks?: string[];
}

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) {
      return false;
    }
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate the LibreOffice executable
 *
 * Precedence:
 * 1. `explicitPath`; if it is not an executable file, resolution fails
 * 2. `libreoffice` or `soffice` on the search path
 * 3. the macOS application bundle
 *
 * @throws ConverterNotFoundError
 */
export async function resolveLibreOfficePath(options: ResolveOptions = {}): Promise<string> {
  const { explicitPath } = options;
  if (explicitPath) {
    if (await isExecutableFile(explicitPath)) {
      return explicitPath;
    }
    logger.error({ libreOfficePath: explicitPath }, 'Configured LibreOffice executable not found');
    throw new ConverterNotFoundError('LibreOffice executable not found at the configured LIBREOFFICE_BIN path');
  }

  const searchPath = options.searchPath ?? process.env.PATH ?? '';
  const directories = searchPath.split(path.delimiter).filter((dir) => dir.length > 0);
  for (const name of BINARY_NAMES) {
    for (const dir of directories) {
      const candidate = path.join(dir, name);
      if (await isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  for (const candidate of options.fallbacks ?? DEFAULT_FALLBACKS) {
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }

  throw new ConverterNotFoundError(
    'LibreOffice executable not found; install LibreOffice or set LIBREOFFICE_BIN to the full path'
  );
}
