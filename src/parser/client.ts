import axios, { AxiosResponse } from 'axios';
import type { ParseRequest, ParseResult } from '../types';
import { createLogger } from '../utils/logger';
import { UpstreamError } from '../errors';

const logger = createLogger('parser:client');

const SNIPPET_LENGTH = 1000;

export interface ParserClientSettings {
  /** Multipart field name the parser reads the PDF from */
  fileField: string;
  /** Request timeout in milliseconds */
  timeout: number;
}

function describeFailure(error: unknown, timeout: number): string {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return `timed out after ${timeout}ms`;
    }
    if (error.code === 'ERR_CANCELED') {
      return 'request was aborted';
    }
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Client for the downstream PDF parsing service
 *
 * Posts the PDF once as multipart/form-data together with the tuning form
 * fields and hands a 2xx JSON answer back as the exact text received. Every
 * other outcome becomes an UpstreamError. Nothing is retried.
 */
export class ParserClient {
  constructor(private readonly settings: ParserClientSettings) {}

  async parse(pdf: Buffer, request: ParseRequest): Promise<ParseResult> {
    const { url, correlationId } = request;

    const form = new FormData();
    for (const [name, value] of Object.entries(request.form)) {
      form.append(name, String(value));
    }
    form.append(
      this.settings.fileField,
      new Blob([new Uint8Array(pdf)], { type: 'application/pdf' }),
      request.filename
    );

    const headers: Record<string, string> = { accept: 'application/json' };
    if (correlationId) {
      headers['x-correlation-id'] = correlationId;
    }

    logger.info(
      { correlationId, url, pdfSize: pdf.length, fileField: this.settings.fileField },
      'Posting PDF to parser'
    );
    logger.debug({ correlationId, form: request.form, query: request.query }, 'Parser request fields');

    let response: AxiosResponse<string>;
    try {
      response = await axios.post<string>(url, form, {
        params: request.query && Object.keys(request.query).length > 0 ? request.query : undefined,
        headers,
        timeout: this.settings.timeout,
        signal: request.signal,
        responseType: 'text',
        maxBodyLength: Infinity,
        maxContentLength: Infinity,
        validateStatus: () => true,
      });
    } catch (error) {
      const reason = describeFailure(error, this.settings.timeout);
      logger.error({ correlationId, url, error: reason }, 'Parser request failed');
      throw new UpstreamError(`Failed to call parser: ${reason}`, { correlationId, parserUrl: url });
    }

    const { status } = response;
    const text = typeof response.data === 'string' ? response.data : '';
    const snippet = text.slice(0, SNIPPET_LENGTH);
    logger.info(
      { correlationId, status, contentType: response.headers['content-type'] },
      'Parser responded'
    );

    if (status < 200 || status >= 300) {
      throw new UpstreamError(`Parser returned status ${status}: ${snippet}`, {
        correlationId,
        parserUrl: url,
        httpStatus: status,
      });
    }

    try {
      JSON.parse(text);
    } catch {
      logger.error({ correlationId, status, snippet }, 'Parser returned non-JSON');
      throw new UpstreamError(`Parser returned non-JSON (status ${status}). Snippet: ${snippet}`, {
        correlationId,
        parserUrl: url,
        httpStatus: status,
      });
    }

    return { status, body: text };
  }
}
