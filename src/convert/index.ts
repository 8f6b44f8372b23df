// LibreOffice conversion module

export {
  LibreOfficeConverter,
  SUPPORTED_EXTENSIONS,
  isSupportedExtension,
  type LibreOfficeSettings,
} from './soffice';
export { resolveLibreOfficePath, type ResolveOptions } from './resolve';
export { runProcess, ProcessError, type ProcessResult, type RunProcessOptions } from './process';
