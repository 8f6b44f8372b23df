import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { tmpdir } from 'os';
import { loadConfig, validateConfig, isHttpUrl } from '../src/config';
import { testConfig } from './helpers/fake-soffice';

const MANAGED_ENV = [
  'PORT',
  'NODE_ENV',
  'LOG_LEVEL',
  'SHOW_DOCS',
  'PARSER_URL',
  'PARSE_URL',
  'PARSER_FILE_FIELD',
  'PARSER_TIMEOUT',
  'LIBREOFFICE_BIN',
  'LIBREOFFICE_PATH',
  'CONVERSION_TIMEOUT',
  'CONVERSION_WORKDIR',
  'MAX_UPLOAD_BYTES',
];

describe('Configuration', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const name of MANAGED_ENV) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of MANAGED_ENV) {
      if (saved[name] === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = saved[name];
      }
    }
  });

  describe('loadConfig', () => {
    it('should apply defaults when nothing is set', () => {
      expect(loadConfig()).toEqual({
        port: 8080,
        nodeEnv: 'development',
        logLevel: 'info',
        showDocs: false,
        parserUrl: undefined,
        parserFileField: 'files',
        parserTimeout: 300000,
        libreOfficePath: undefined,
        conversionTimeout: 120000,
        conversionWorkdir: tmpdir(),
        maxUploadBytes: 104857600,
      });
    });

    it('should read values from the environment', () => {
      process.env.PORT = '9000';
      process.env.NODE_ENV = 'production';
      process.env.LOG_LEVEL = 'debug';
      process.env.SHOW_DOCS = 'TRUE';
      process.env.PARSER_URL = 'http://parser.internal:31007/file_parse';
      process.env.PARSER_FILE_FIELD = 'file';
      process.env.PARSER_TIMEOUT = '1000';
      process.env.LIBREOFFICE_BIN = '/opt/libreoffice/program/soffice';
      process.env.CONVERSION_TIMEOUT = '30000';
      process.env.CONVERSION_WORKDIR = '/var/tmp';
      process.env.MAX_UPLOAD_BYTES = '2048';

      expect(loadConfig()).toEqual({
        port: 9000,
        nodeEnv: 'production',
        logLevel: 'debug',
        showDocs: true,
        parserUrl: 'http://parser.internal:31007/file_parse',
        parserFileField: 'file',
        parserTimeout: 1000,
        libreOfficePath: '/opt/libreoffice/program/soffice',
        conversionTimeout: 30000,
        conversionWorkdir: '/var/tmp',
        maxUploadBytes: 2048,
      });
    });

    it('should fall back to PARSE_URL and LIBREOFFICE_PATH', () => {
      process.env.PARSE_URL = 'https://parser.example.com/parse';
      process.env.LIBREOFFICE_PATH = '/usr/bin/soffice';

      const config = loadConfig();

      expect(config.parserUrl).toBe('https://parser.example.com/parse');
      expect(config.libreOfficePath).toBe('/usr/bin/soffice');
    });

    it('should prefer PARSER_URL over PARSE_URL', () => {
      process.env.PARSER_URL = 'http://primary/parse';
      process.env.PARSE_URL = 'http://secondary/parse';

      expect(loadConfig().parserUrl).toBe('http://primary/parse');
    });

    it('should treat blank values as unset', () => {
      process.env.PARSER_URL = '   ';
      process.env.PORT = '';

      const config = loadConfig();

      expect(config.parserUrl).toBeUndefined();
      expect(config.port).toBe(8080);
    });

    it('should only enable docs for "true"', () => {
      process.env.SHOW_DOCS = 'yes';

      expect(loadConfig().showDocs).toBe(false);
    });
  });

  describe('validateConfig', () => {
    it('should accept a valid configuration', () => {
      expect(() => validateConfig(testConfig({ parserUrl: 'https://parser.example.com' }))).not.toThrow();
    });

    it('should reject non-numeric and non-positive numbers', () => {
      expect(() => validateConfig(testConfig({ conversionTimeout: NaN, maxUploadBytes: 0 }))).toThrow(
        'Invalid configuration: conversionTimeout must be a positive integer; maxUploadBytes must be a positive integer'
      );
    });

    it('should reject a parser URL without an http scheme', () => {
      expect(() => validateConfig(testConfig({ parserUrl: 'ftp://parser.example.com' }))).toThrow(
        'Invalid configuration: parserUrl must start with http:// or https://'
      );
    });
  });

  describe('isHttpUrl', () => {
    it('should accept http and https only', () => {
      expect(isHttpUrl('http://a')).toBe(true);
      expect(isHttpUrl('https://a')).toBe(true);
      expect(isHttpUrl('ftp://a')).toBe(false);
      expect(isHttpUrl('parser.example.com')).toBe(false);
    });
  });
});
