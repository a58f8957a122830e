export { buildAlerts, roundAcres, summarizeAlerts, toAlert, toAlertDocument, topAlerts } from "./alerts";
export { HttpImageryGateway, HttpVectorizer } from "./api";
export type { ServiceClientOptions } from "./api";
export { loadRegion } from "./boundary";
export type { LoadedRegion, RegionSource } from "./boundary";
export { classify, DEFAULT_DECREASE_THRESHOLD, DEFAULT_INCREASE_THRESHOLD, validateThresholds } from "./change";
export type { ChangeClassification } from "./change";
export { DEFAULT_BOUNDS, DEFAULT_PIPELINE_CONFIG, loadConfig, parseConfig } from "./config";
export type { AppConfig } from "./config";
export {
  BoundaryError,
  CanopyWatchError,
  ConfigurationError,
  describeError,
  ParseError,
  RasterMismatchError,
  ServiceError,
  SetupError
} from "./errors";
export {
  classifySeverity,
  DEFAULT_MIN_AREA_ACRES,
  extractFeatures,
  HIGH_SEVERITY_ACRES,
  meetsMinimumArea,
  SQUARE_METERS_TO_ACRES,
  squareMetersToAcres
} from "./features";
export type { ExtractOptions } from "./features";
export { DEFAULT_CLOUD_CEILING_PERCENT } from "./gateway";
export type { CompositeResult, ImageryGateway, SceneInventory } from "./gateway";
export { boundsToPolygon, pointInsideGeometry } from "./geometry";
export { computeIndex, INDEX_BANDS, meanIndex, normalizedDifference } from "./indices";
export type { BandPair } from "./indices";
export { createLogger, logger } from "./logger";
export type { Logger } from "./logger";
export { runChangeDetection } from "./pipeline";
export type { PipelineResult, RunOptions, SceneCounts } from "./pipeline";
export { reportAlerts, serializeAlertDocument, writeAlertDocument } from "./report";
export { collectionToGeometry, geoJsonToGeometry, parseShapefileZip } from "./shp";
export type {
  Alert,
  AlertDocument,
  AlertType,
  Bounds,
  ChangeFeature,
  ChangeKind,
  CompositeRaster,
  DateWindow,
  IndexRaster,
  LngLat,
  Mask,
  PipelineConfig,
  RasterGrid,
  Region,
  Severity,
  VegetationIndex,
  WindowPair
} from "./types";
export { validatePipelineConfig } from "./validators";
export { DEFAULT_MAX_PIXELS, DEFAULT_SCALE_METERS, LocalVectorizer } from "./vectorize";
export type { FeatureMeasurement, VectorFeature, VectorizeRequest, Vectorizer } from "./vectorize";
export { COMPOSITE_DAYS, DEFAULT_LOOKBACK_DAYS, formatDate, parseReferenceDate, selectWindows } from "./windows";
