// Common TypeScript interfaces and types

export interface HealthStatus {
  status: 'ok';
}

export interface ReadinessStatus {
  ready: boolean;
  checks: {
    libreoffice: boolean;
  };
  libreofficePath: string | null;
  parserUrlConfigured: boolean;
  /** Counters since startup */
  conversions: ConversionStats;
}

export interface ServiceInfo {
  service: string;
  endpoints: string[];
}

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: string;
  /** Expose Swagger UI and the OpenAPI document */
  showDocs: boolean;
  // Downstream parser settings
  parserUrl?: string;
  parserFileField: string;
  parserTimeout: number;
  // LibreOffice conversion settings
  libreOfficePath?: string;
  conversionTimeout: number;
  conversionWorkdir: string;
  maxUploadBytes: number;
}

// Upload / Conversion Types

/**
 * A presentation received in a multipart request body
 */
export interface Upload {
  /** File name as sent by the client */
  filename: string;
  /** Lower-cased extension including the dot, e.g. ".pptx" */
  extension: string;
  content: Buffer;
}

/**
 * Options for a single LibreOffice conversion
 */
export interface ConversionOptions {
  /** Timeout in milliseconds (default: 120000) */
  timeout?: number;
  /** Directory under which the per-job temp directory is created (default: OS temp dir) */
  workdir?: string;
  /** Correlation ID for log tracing */
  correlationId?: string;
  /** Aborts the converter process, e.g. when the client disconnects */
  signal?: AbortSignal;
}

/**
 * Conversion counters reported by GET /readyz
 */
export interface ConversionStats {
  activeJobs: number;
  completedJobs: number;
  failedJobs: number;
  totalConversions: number;
}

// Parser Types

/**
 * Tuning fields forwarded to the downstream parser as form fields
 */
export interface ParserFormFields {
  return_middle_json: boolean;
  return_model_output: boolean;
  return_md: boolean;
  return_images: boolean;
  end_page_id: number;
  parse_method: string;
  start_page_id: number;
  lang_list: string;
  output_dir: string;
  server_url: string;
  return_content_list: boolean;
  backend: string;
  table_enable: boolean;
  formula_enable: boolean;
}

/**
 * Query string accepted by POST /convert_and_parse
 *
 * Keys prefixed with `parser_query_` are forwarded to the parser as query params.
 */
export type ConvertAndParseQuery = Partial<ParserFormFields> & {
  parser_url?: string;
  [key: string]: unknown;
};

export interface ParseRequest {
  url: string;
  /** File name of the PDF part */
  filename: string;
  form: ParserFormFields;
  query?: Record<string, string>;
  correlationId?: string;
  signal?: AbortSignal;
}

export interface ParseResult {
  /** 2xx status returned by the parser */
  status: number;
  /** Parser JSON body as received; checked to parse, never re-serialized */
  body: string;
}
