import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { pathToFileURL } from 'url';
import type { ConversionOptions, ConversionStats } from '../types';
import { createLogger } from '../utils/logger';
import { runProcess, ProcessError } from './process';
import { resolveLibreOfficePath } from './resolve';
import {
  ConversionError,
  ConversionOutputMissingError,
  ConversionTimeoutError,
  ConverterNotFoundError,
  UnsupportedFileTypeError,
} from '../errors';

const logger = createLogger('convert:soffice');

const DEFAULT_TIMEOUT = 120000; // 2 minutes

/** Presentation formats LibreOffice Impress imports */
export const SUPPORTED_EXTENSIONS: readonly string[] = ['.ppt', '.pptx', '.pps', '.ppsx', '.odp'];

export function isSupportedExtension(extension: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(extension.toLowerCase());
}

export interface LibreOfficeSettings {
  /** Explicit soffice path; otherwise resolved from PATH */
  libreOfficePath?: string;
  timeout?: number;
  workdir?: string;
}

/**
 * LibreOffice Converter
 *
 * Converts presentations to PDF using soffice --headless, one process per call.
 *
 * Every call gets its own temp directory (input file, LibreOffice user profile,
 * output PDF) which is removed before the call returns, whatever the outcome.
 * The process is killed when the timeout elapses or the abort signal fires.
 *
 * @example
 * ```typescript
 * const converter = new LibreOfficeConverter({ timeout: 60000 });
 * const pdf = await converter.convertToPdf(pptxBuffer, '.pptx', {
 *   correlationId: 'request-123',
 * });
 * ```
 */
export class LibreOfficeConverter {
  private activeJobs = 0;
  private stats: ConversionStats = {
    activeJobs: 0,
    completedJobs: 0,
    failedJobs: 0,
    totalConversions: 0,
  };

  constructor(private readonly settings: LibreOfficeSettings = {}) {
    logger.info(
      {
        libreOfficePath: settings.libreOfficePath ?? '(search PATH)',
        timeout: settings.timeout ?? DEFAULT_TIMEOUT,
      },
      'LibreOfficeConverter initialized'
    );
  }

  /**
   * Convert a presentation buffer to a PDF buffer
   *
   * @param input - Presentation file contents
   * @param extension - Extension of the uploaded file name, e.g. ".pptx"
   * @throws UnsupportedFileTypeError before anything is written or spawned
   * @throws ConversionError (or a subclass) when LibreOffice fails, times out or produces nothing
   */
  async convertToPdf(
    input: Buffer,
    extension: string,
    options: ConversionOptions = {}
  ): Promise<Buffer> {
    const correlationId = options.correlationId || this.generateCorrelationId();
    const timeout = options.timeout ?? this.settings.timeout ?? DEFAULT_TIMEOUT;
    const workdir = options.workdir ?? this.settings.workdir ?? tmpdir();
    const normalizedExtension = extension.toLowerCase();

    if (!isSupportedExtension(normalizedExtension)) {
      throw new UnsupportedFileTypeError(normalizedExtension, SUPPORTED_EXTENSIONS, { correlationId });
    }

    logger.debug(
      { correlationId, inputSize: input.length, extension: normalizedExtension, timeout, workdir },
      'Starting PDF conversion'
    );

    const startTime = Date.now();
    this.activeJobs++;
    this.stats.activeJobs = this.activeJobs;
    this.stats.totalConversions++;

    try {
      const result = await this.runConversion(
        input,
        normalizedExtension,
        timeout,
        workdir,
        correlationId,
        options.signal
      );

      this.stats.completedJobs++;
      logger.info(
        { correlationId, pdfSize: result.length, duration: Date.now() - startTime },
        'Conversion completed successfully'
      );

      return result;
    } catch (error) {
      this.stats.failedJobs++;
      logger.error(
        {
          correlationId,
          error: error instanceof Error ? error.message : String(error),
          duration: Date.now() - startTime,
        },
        'Conversion failed'
      );
      throw error;
    } finally {
      this.activeJobs--;
      this.stats.activeJobs = this.activeJobs;
    }
  }

  /**
   * Run the actual conversion using LibreOffice
   *
   * 1. Create a unique temp directory
   * 2. Write the upload as input<ext>
   * 3. Resolve and execute soffice --convert-to pdf
   * 4. Read the PDF LibreOffice wrote next to the input
   * 5. Remove the temp directory
   */
  private async runConversion(
    input: Buffer,
    extension: string,
    timeout: number,
    workdir: string,
    correlationId: string,
    signal: AbortSignal | undefined
  ): Promise<Buffer> {
    const jobWorkdir = await fs.mkdtemp(path.join(workdir, 'pptx2pdf-'));
    logger.debug({ correlationId, jobWorkdir }, 'Created temp directory');

    try {
      const inputPath = path.join(jobWorkdir, `input${extension}`);
      await fs.writeFile(inputPath, input);

      const binary = await resolveLibreOfficePath({ explicitPath: this.settings.libreOfficePath });
      await this.executeLibreOffice(binary, inputPath, jobWorkdir, timeout, correlationId, signal);

      const outputPath = await this.locateOutput(inputPath, jobWorkdir, correlationId);
      const pdfBuffer = await fs.readFile(outputPath);
      logger.debug({ correlationId, outputPath, size: pdfBuffer.length }, 'Read PDF from output');

      return pdfBuffer;
    } finally {
      try {
        await fs.rm(jobWorkdir, { recursive: true, force: true });
        logger.debug({ correlationId, jobWorkdir }, 'Cleaned up temp directory');
      } catch (cleanupError) {
        logger.warn(
          {
            correlationId,
            jobWorkdir,
            error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
          },
          'Failed to cleanup temp directory'
        );
      }
    }
  }

  /**
   * Execute soffice
   *
   * Command: soffice --headless ... --convert-to pdf --outdir <dir> <inputFile>
   */
  private async executeLibreOffice(
    binary: string,
    inputPath: string,
    outputDir: string,
    timeout: number,
    correlationId: string,
    signal: AbortSignal | undefined
  ): Promise<void> {
    // Per-job user profile so concurrent conversions do not share the profile lock
    const userProfile = path.join(outputDir, '.libreoffice-profile');

    const args = [
      '--headless',
      '--nologo',
      '--nofirststartwizard',
      '--nolockcheck',
      '--norestore',
      `-env:UserInstallation=${pathToFileURL(userProfile).href}`,
      '--convert-to',
      'pdf',
      '--outdir',
      outputDir,
      inputPath,
    ];

    logger.debug({ correlationId, command: binary, args, timeout }, 'Executing LibreOffice conversion');

    try {
      const { stdout, stderr } = await runProcess(binary, args, { timeout, signal });

      if (stderr.trim()) {
        logger.warn({ correlationId, stderr: stderr.trim() }, 'LibreOffice produced stderr output');
      }
      logger.debug({ correlationId, stdout: stdout.trim() }, 'LibreOffice conversion completed');
    } catch (error) {
      if (!(error instanceof ProcessError)) {
        throw error;
      }

      const { details } = error;
      logger.error(
        { correlationId, reason: error.reason, ...details, command: binary },
        'LibreOffice conversion failed'
      );

      switch (error.reason) {
        case 'timeout':
          throw new ConversionTimeoutError(timeout, { correlationId, signal: details.signal });
        case 'spawn':
          throw new ConverterNotFoundError(
            `LibreOffice could not be started (${details.errno ?? 'unknown error'})`,
            { correlationId, errno: details.errno }
          );
        case 'aborted':
          throw new ConversionError('request was aborted', { correlationId });
        case 'exit': {
          const output = [details.stderr.trim(), details.stdout.trim()].filter(Boolean).join(' | ');
          const summary =
            details.exitCode !== undefined
              ? `LibreOffice exited with code ${details.exitCode}`
              : `LibreOffice was killed by ${details.signal ?? 'an unknown signal'}`;
          throw new ConversionError(output ? `${summary}: ${output}` : summary, {
            correlationId,
            exitCode: details.exitCode,
            signal: details.signal,
          });
        }
      }
    }
  }

  /**
   * Find the PDF LibreOffice produced
   *
   * LibreOffice names the output after the input stem. When that file is
   * absent but exactly one PDF exists in the directory, that one is used.
   */
  private async locateOutput(inputPath: string, outputDir: string, correlationId: string): Promise<string> {
    const expected = path.join(outputDir, `${path.parse(inputPath).name}.pdf`);
    try {
      await fs.access(expected);
      return expected;
    } catch {
      const pdfs = (await fs.readdir(outputDir)).filter((name) => name.toLowerCase().endsWith('.pdf'));
      if (pdfs.length === 1) {
        return path.join(outputDir, pdfs[0]);
      }
      logger.error({ correlationId, expected, found: pdfs }, 'LibreOffice output not found');
      throw new ConversionOutputMissingError({ correlationId });
    }
  }

  /**
   * Get current conversion counters
   */
  getStats(): ConversionStats {
    return { ...this.stats };
  }

  private generateCorrelationId(): string {
    return `conv-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
  }
}
