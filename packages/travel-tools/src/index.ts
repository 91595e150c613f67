export {
  CatalogIoError,
  CatalogSchemaError,
  TravelCatalog,
  catalogFileSchema,
  citySchema,
  defaultCatalogPath,
  loadCatalog,
  parseCatalogYaml,
  type CatalogFile,
  type City,
  type CityQuery,
} from './catalog';
export {
  REQUIRED_TRAVEL_SLOTS,
  TRAVEL_SLOTS,
  buildTravelGoal,
  initialTravelSlots,
  type TravelSlot,
} from './goal';
export { ReferencePlanHint } from './hint';
export {
  TRANSPORT_MODES,
  transportModeSchema,
  travelRequestSchema,
  type TransportMode,
  type TravelRequest,
  type TravelRequestInput,
} from './request';
export {
  TRAVEL_TOOL_COSTS,
  createTravelTools,
  isTravelToolName,
  type TravelToolName,
  type TravelToolOptions,
} from './tools';
