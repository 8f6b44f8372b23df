import type { ParserFormFields } from '../types';
import { InvalidInputError, ParserNotConfiguredError } from '../errors';
import { isHttpUrl } from '../config';

/** Form fields sent to the parser when the request does not override them */
export const PARSER_FIELD_DEFAULTS: Readonly<ParserFormFields> = {
  return_middle_json: false,
  return_model_output: false,
  return_md: true,
  return_images: false,
  end_page_id: 99999,
  parse_method: 'auto',
  start_page_id: 0,
  lang_list: 'ch',
  output_dir: './output',
  server_url: 'string',
  return_content_list: false,
  backend: 'pipeline',
  table_enable: true,
  formula_enable: true,
};

/** Query params with this prefix are forwarded to the parser without it */
export const PARSER_QUERY_PREFIX = 'parser_query_';

function jsonSchemaFor(value: string | number | boolean): { type: string; default: string | number | boolean } {
  if (typeof value === 'boolean') {
    return { type: 'boolean', default: value };
  }
  if (typeof value === 'number') {
    return { type: 'integer', default: value };
  }
  return { type: 'string', default: value };
}

/**
 * JSON Schema for the POST /convert_and_parse query string
 */
const queryProperties: Record<string, object> = {
  parser_url: {
    type: 'string',
    description: 'Parser endpoint for this request only; overrides X-Parser-Url and PARSER_URL',
  },
  ...Object.fromEntries(
    Object.entries(PARSER_FIELD_DEFAULTS).map(([name, value]) => [name, jsonSchemaFor(value)])
  ),
};

export const convertAndParseQuerySchema = {
  type: 'object',
  properties: queryProperties,
  additionalProperties: true,
};

function boolField(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return fallback;
}

function intField(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return parseInt(value, 10);
  return fallback;
}

function stringField(value: unknown, fallback: string): string {
  return typeof value === 'string' ? value : fallback;
}

/**
 * Merge the request's tuning params over the defaults
 */
export function parserFormFields(query: Record<string, unknown>): ParserFormFields {
  const d = PARSER_FIELD_DEFAULTS;
  return {
    return_middle_json: boolField(query.return_middle_json, d.return_middle_json),
    return_model_output: boolField(query.return_model_output, d.return_model_output),
    return_md: boolField(query.return_md, d.return_md),
    return_images: boolField(query.return_images, d.return_images),
    end_page_id: intField(query.end_page_id, d.end_page_id),
    parse_method: stringField(query.parse_method, d.parse_method),
    start_page_id: intField(query.start_page_id, d.start_page_id),
    lang_list: stringField(query.lang_list, d.lang_list),
    output_dir: stringField(query.output_dir, d.output_dir),
    server_url: stringField(query.server_url, d.server_url),
    return_content_list: boolField(query.return_content_list, d.return_content_list),
    backend: stringField(query.backend, d.backend),
    table_enable: boolField(query.table_enable, d.table_enable),
    formula_enable: boolField(query.formula_enable, d.formula_enable),
  };
}

/**
 * Collect `parser_query_<name>` params as `<name>` params for the parser
 *
 * Repeated keys keep the last value.
 *
 * @throws InvalidInputError for a bare `parser_query_` key
 */
export function parserQueryParams(query: Record<string, unknown>): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(query)) {
    if (!key.startsWith(PARSER_QUERY_PREFIX)) {
      continue;
    }
    const name = key.slice(PARSER_QUERY_PREFIX.length);
    if (!name) {
      throw new InvalidInputError(`${PARSER_QUERY_PREFIX} prefix requires a field name`);
    }
    const last = Array.isArray(value) ? value[value.length - 1] : value;
    params[name] = String(last ?? '');
  }
  return params;
}

/**
 * Pick the parser URL for one request
 *
 * Precedence: query param, then X-Parser-Url header, then the configured default.
 *
 * @throws ParserNotConfiguredError when none is available
 * @throws InvalidInputError when the chosen URL is not http(s)
 */
export function resolveParserUrl(
  queryOverride: string | undefined,
  headerOverride: string | undefined,
  configured: string | undefined
): string {
  const url = queryOverride || headerOverride || configured;
  if (!url) {
    throw new ParserNotConfiguredError();
  }
  if (!isHttpUrl(url)) {
    throw new InvalidInputError('parser_url must start with http:// or https://', { parserUrl: url });
  }
  return url;
}
