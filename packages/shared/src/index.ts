export type {
  Availability,
  Facets,
  ListingMetadata,
  MergedProduct,
  NamedCount,
  RawListing,
  RegionInfo,
  SearchDiagnostics,
  SearchResponse,
  SortKey,
  SourceDiagnostic,
  SourceStatus,
  StoreInfo,
} from "./types.js";
