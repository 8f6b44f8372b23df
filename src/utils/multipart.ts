import { v4 as uuidv4 } from 'uuid';
import { escapeQuotedName } from './filenames';

export interface MultipartFilePart {
  fieldName: string;
  filename: string;
  content: Buffer;
  /** Default: application/pdf */
  contentType?: string;
}

export interface MultipartBody {
  body: Buffer;
  /** Value for the Content-Type header, boundary included */
  contentType: string;
}

const CRLF = '\r\n';

/**
 * Build a multipart/form-data body holding a single file part
 */
export function buildMultipartBody(part: MultipartFilePart, boundary = `----pptx2pdf-${uuidv4().replace(/-/g, '')}`): MultipartBody {
  const header =
    `--${boundary}${CRLF}` +
    `Content-Disposition: form-data; name="${escapeQuotedName(part.fieldName)}"; filename="${escapeQuotedName(part.filename)}"${CRLF}` +
    `Content-Type: ${part.contentType ?? 'application/pdf'}${CRLF}${CRLF}`;
  const footer = `${CRLF}--${boundary}--${CRLF}`;

  return {
    body: Buffer.concat([Buffer.from(header, 'utf8'), part.content, Buffer.from(footer, 'utf8')]),
    contentType: `multipart/form-data; boundary=${boundary}`,
  };
}
