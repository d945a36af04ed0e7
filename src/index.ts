/**
 * Flex statement parser public API
 *
 * @module flex-statement-parser
 */

export * from './shared/flex/codes';
export * from './shared/flex/temporal';
export * from './shared/flex/errors';
export * from './shared/flex/schema';
export * from './shared/flex/records';
export * from './shared/flex/registry';
export * from './shared/flex/diagnostics';
export {
  FlexParser,
  createFlexParser,
  parseFlexQueryResponse,
  validateFlexQueryResponse,
  resolveParseOptions,
  type FlexParseResult,
  type FlexValidationResult,
  type FlexParserConfig,
  type ParserLogger,
} from './shared/flex/parser';
export { readXmlTree, type XmlElement, type XmlInput } from './shared/flex/xml-tree';
export {
  ParseOptionsSchema,
  DateFormatModeSchema,
  FlexClientConfigSchema,
  DEFAULT_PARSE_OPTIONS,
  STRICT_PARSE_OPTIONS,
  PERMISSIVE_PARSE_OPTIONS,
  DEFAULT_FLEX_CLIENT_CONFIG,
  loadCliConfig,
  type DateFormatMode,
  type ParseOptions,
  type ParseOptionsInput,
  type FlexClientConfig,
  type FlexClientConfigInput,
} from './shared/types/config.types';
export {
  FlexClient,
  FlexClientError,
  FLEX_CLIENT_ERROR_CODES,
  FLEX_SERVICE_ERRORS,
  type FlexClientErrorCode,
  type FlexClientDependencies,
  type StatementAccess,
  type StatementRequestResult,
} from './main/services/flex-client.service';
export {
  StatementService,
  summarizeStatement,
  type StatementServiceOptions,
  type StatementSummary,
} from './main/services/statement.service';
export { createLogger, logger } from './main/utils/logger';
