// ---------------------------------------------------------------------------
// Public entry point.
// ---------------------------------------------------------------------------

export type {
  BookIdentifiers,
  BookRecord,
  CandidateUrl,
  CoverResult,
  CoverSize,
  CoverUrlCache,
  FetchedPage,
  FetcherConfig,
  IdentifyOutcome,
  IdentifyStopReason,
  ISBN,
  ISBN10,
  ISBN13,
  LookupOptions,
  LookupRequest,
  ResultSink,
  SearchQuery,
  SearchTarget,
  SourcePrefs,
  TextTokenizers,
} from "./core/types.js";

export {
  BotChallengeError,
  ConfigurationError,
  FetchError,
  MalformedPageError,
  MetadataSourceError,
  NetworkError,
  SearchConsistencyError,
  TimeoutError,
} from "./core/errors.js";

export {
  MetadataSource,
  SOURCE_INFO,
  searchTargets,
  type BookUrl,
  type MetadataSourceOptions,
} from "./orchestrator/metadata-source.js";

export { buildApp, type AppContext } from "./app.js";
export { DEFAULT_FETCHER_CONFIG, DEFAULT_TIMEOUT_MS, loadConfig, parsePrefs } from "./config/config.js";
export { knownCountryCodes, loadCountryCatalogue, type Country } from "./config/countries.js";
export { createLogger } from "./logging/logger.js";
export { MemoryCoverUrlCache } from "./cache/cover-url-cache.js";
export { buildDetailUrl, buildQuery, buildSearchUrl } from "./query/query-builder.js";
export { defaultTokenizers } from "./query/tokens.js";
export { isBlacklisted, parseBlacklist } from "./filter/blacklist.js";
export { parseDetailPage } from "./parser/detail-page-parser.js";
export { deriveCoverUrl } from "./parser/cover-url.js";
export { WebFetcher } from "./fetcher/web-fetcher.js";
export { SearchPaginator } from "./search/search-paginator.js";
