import { FastifyRequest } from 'fastify';
import type { Upload } from './types';
import { InvalidInputError, UnsupportedFileTypeError } from './errors';
import { SUPPORTED_EXTENSIONS, isSupportedExtension } from './convert';
import { uploadBaseName, uploadExtension } from './utils/filenames';

/**
 * Read the first file part of a multipart request
 *
 * The extension is checked before the file is buffered, so an unsupported
 * upload never reaches the converter.
 *
 * @throws InvalidInputError when the body is not multipart or carries no file
 * @throws UnsupportedFileTypeError for non-presentation file names
 */
export async function readUpload(request: FastifyRequest, correlationId: string): Promise<Upload> {
  if (!request.isMultipart()) {
    throw new InvalidInputError('Expected a multipart/form-data body with a file field', { correlationId });
  }

  const part = await request.file();
  if (!part || !part.filename) {
    part?.file.resume();
    throw new InvalidInputError('No file uploaded', { correlationId });
  }

  const filename = uploadBaseName(part.filename);
  const extension = uploadExtension(filename);
  if (!isSupportedExtension(extension)) {
    part.file.resume();
    throw new UnsupportedFileTypeError(extension, SUPPORTED_EXTENSIONS, { correlationId, filename });
  }

  const content = await part.toBuffer();
  if (content.length === 0) {
    throw new InvalidInputError('Uploaded file is empty', { correlationId, filename });
  }

  return { filename, extension, content };
}
