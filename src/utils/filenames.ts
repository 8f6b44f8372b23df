import path from 'path';

/**
 * Strip any directory part a client put in an upload file name
 */
export function uploadBaseName(filename: string): string {
  const parts = filename.split(/[\\/]/);
  return parts[parts.length - 1];
}

/**
 * Lower-cased extension including the dot, or "" when there is none
 */
export function uploadExtension(filename: string): string {
  return path.extname(uploadBaseName(filename)).toLowerCase();
}

/**
 * Name of the PDF handed back to the client: the upload's stem plus ".pdf"
 */
export function pdfDownloadName(filename: string): string {
  const stem = path.parse(uploadBaseName(filename)).name;
  return `${stem || 'document'}.pdf`;
}

/**
 * Escape a file name for a quoted header parameter (CR, LF and double quote)
 */
export function escapeQuotedName(name: string): string {
  return name.replace(/\r/g, '%0D').replace(/\n/g, '%0A').replace(/"/g, '%22');
}

/**
 * Content-Disposition value for a downloaded file
 *
 * Non-ASCII names get an ASCII fallback plus an RFC 5987 `filename*` parameter.
 */
export function attachmentDisposition(filename: string): string {
  const ascii = escapeQuotedName(filename.replace(/[^\x20-\x7e]/g, '_'));
  if (ascii === filename) {
    return `attachment; filename="${ascii}"`;
  }
  return `attachment; filename="${ascii}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}
