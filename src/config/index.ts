import { tmpdir } from 'os';
import { AppConfig } from '../types';

/**
 * Parse an integer environment variable, falling back to a default when unset
 */
function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return parseInt(raw, 10);
}

/**
 * Return the first environment variable among `names` that is set and non-empty
 */
function firstEnv(...names: string[]): string | undefined {
  for (const name of names) {
    const value = process.env[name]?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
}

/**
 * Load configuration from environment variables
 *
 * Read once at startup; the resulting object is handed to `build()` and
 * never mutated afterwards.
 */
export function loadConfig(): AppConfig {
  return {
    port: intFromEnv('PORT', 8080),
    nodeEnv: process.env.NODE_ENV || 'development',
    logLevel: process.env.LOG_LEVEL || 'info',
    showDocs: (process.env.SHOW_DOCS || 'false').toLowerCase() === 'true',
    // Downstream parser settings
    parserUrl: firstEnv('PARSER_URL', 'PARSE_URL'),
    parserFileField: firstEnv('PARSER_FILE_FIELD') || 'files',
    parserTimeout: intFromEnv('PARSER_TIMEOUT', 300000),
    // LibreOffice conversion settings
    libreOfficePath: firstEnv('LIBREOFFICE_BIN', 'LIBREOFFICE_PATH'),
    conversionTimeout: intFromEnv('CONVERSION_TIMEOUT', 120000),
    conversionWorkdir: firstEnv('CONVERSION_WORKDIR') || tmpdir(),
    maxUploadBytes: intFromEnv('MAX_UPLOAD_BYTES', 100 * 1024 * 1024),
  };
}

/**
 * Check whether a URL uses the http or https scheme
 */
export function isHttpUrl(url: string): boolean {
  return url.startsWith('http://') || url.startsWith('https://');
}

/**
 * Validate configuration before the server starts
 *
 * @throws Error listing every invalid setting
 */
export function validateConfig(config: AppConfig): void {
  const problems: string[] = [];

  const positive: Array<keyof AppConfig> = [
    'port',
    'parserTimeout',
    'conversionTimeout',
    'maxUploadBytes',
  ];
  for (const key of positive) {
    const value = config[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      problems.push(`${key} must be a positive integer`);
    }
  }

  if (config.parserUrl !== undefined && !isHttpUrl(config.parserUrl)) {
    problems.push('parserUrl must start with http:// or https://');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
}
