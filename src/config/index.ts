export { DEFAULT_CONFIG, loadConfig } from "./loadConfig";
export type { AppConfig, ConfigOverrides, JitterRange, LedgerMode } from "./types";
export {
  DEFAULT_EXTENSIONS,
  SourceDescriptorSchema,
  SourceRegistrySchema,
  loadSourceRegistry,
  parseSourceRegistry,
} from "./sourceRegistry";
export type {
  ApiSource,
  DirectSource,
  HierarchicalSource,
  LinkFilter,
  ListingSource,
  ManualSource,
  PaginatedSource,
  PeriodLayout,
  RenderedSource,
  SourceDescriptor,
  SourceRegistry,
  StrategyKind,
  TraversalLevel,
} from "./sourceRegistry";
