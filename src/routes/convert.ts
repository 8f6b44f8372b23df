import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ConvertAndParseQuery, Upload } from '../types';
import { getCorrelationId, setCorrelationId } from '../utils/correlation-id';
import { abortOnDisconnect } from '../utils/abort';
import { attachmentDisposition, pdfDownloadName } from '../utils/filenames';
import { buildMultipartBody } from '../utils/multipart';
import { readUpload } from '../upload';
import {
  convertAndParseQuerySchema,
  parserFormFields,
  parserQueryParams,
  resolveParserUrl,
} from '../parser';

const uploadDescription =
  'multipart/form-data body with one presentation file (.ppt, .pptx, .pps, .ppsx, .odp)';

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Conversion routes
 */
export async function convertRoutes(app: FastifyInstance): Promise<void> {
  /**
   * Read the upload and run it through LibreOffice
   */
  async function convertUpload(
    request: FastifyRequest,
    correlationId: string,
    signal: AbortSignal
  ): Promise<{ upload: Upload; pdf: Buffer }> {
    const upload = await readUpload(request, correlationId);
    request.log.info(
      { correlationId, filename: upload.filename, size: upload.content.length },
      'Received presentation'
    );

    const pdf = await app.converter.convertToPdf(upload.content, upload.extension, {
      correlationId,
      signal,
    });
    return { upload, pdf };
  }

  /**
   * POST /convert - upload a presentation, receive the PDF
   */
  app.post(
    '/convert',
    { schema: { description: `Convert to PDF. Body: ${uploadDescription}`, consumes: ['multipart/form-data'] } },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      const { upload, pdf } = await convertUpload(request, correlationId, abortOnDisconnect(reply));

      return reply
        .code(200)
        .header('content-type', 'application/pdf')
        .header('content-disposition', attachmentDisposition(pdfDownloadName(upload.filename)))
        .send(pdf);
    }
  );

  /**
   * POST /convert_multipart - same conversion, PDF wrapped in a multipart body
   * with one field named "file"
   */
  app.post(
    '/convert_multipart',
    {
      schema: {
        description: `Convert to PDF, answered as multipart/form-data with a "file" part. Body: ${uploadDescription}`,
        consumes: ['multipart/form-data'],
      },
    },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      const { upload, pdf } = await convertUpload(request, correlationId, abortOnDisconnect(reply));
      const { body, contentType } = buildMultipartBody({
        fieldName: 'file',
        filename: pdfDownloadName(upload.filename),
        content: pdf,
      });

      return reply.code(200).header('content-type', contentType).send(body);
    }
  );

  /**
   * POST /convert_and_parse - convert, post the PDF to the parser, return its JSON
   */
  app.post<{ Querystring: ConvertAndParseQuery }>(
    '/convert_and_parse',
    {
      schema: {
        description: `Convert to PDF and forward it to the parser. Body: ${uploadDescription}`,
        consumes: ['multipart/form-data'],
        querystring: convertAndParseQuerySchema,
      },
    },
    async (request, reply) => {
      const correlationId = getCorrelationId(request);
      setCorrelationId(reply, correlationId);

      const { query } = request;
      const parserUrl = resolveParserUrl(
        typeof query.parser_url === 'string' ? query.parser_url : undefined,
        firstHeader(request.headers['x-parser-url']),
        app.config.parserUrl
      );
      const form = parserFormFields(query);
      const parserQuery = parserQueryParams(query);

      const signal = abortOnDisconnect(reply);
      const { upload, pdf } = await convertUpload(request, correlationId, signal);

      const result = await app.parserClient.parse(pdf, {
        url: parserUrl,
        filename: pdfDownloadName(upload.filename),
        form,
        query: parserQuery,
        correlationId,
        signal,
      });

      return reply
        .code(result.status)
        .header('content-type', 'application/json; charset=utf-8')
        .send(result.body);
    }
  );
}
