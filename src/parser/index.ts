export { ParserClient, type ParserClientSettings } from './client';
export {
  PARSER_FIELD_DEFAULTS,
  PARSER_QUERY_PREFIX,
  convertAndParseQuerySchema,
  parserFormFields,
  parserQueryParams,
  resolveParserUrl,
} from './fields';
