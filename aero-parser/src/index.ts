export * from "./lib/errors";
export * from "./lib/countries";
export { logger } from "./lib/logger";
export type { Logger } from "./lib/logger";

export * from "./models/cup";
export * from "./models/geo";
export * from "./models/waypoint";
export * from "./models/directory";

export * from "./services/units";
export * from "./services/cup";
export * from "./services/openair";
export * from "./services/geo";
export * from "./services/reconcile";

export {
  SupabaseAirportDirectory,
  type RpcClient,
  createDirectoryClient,
  fetchCountries,
  getLastUpdate,
  parseBboxResponse,
  parseNearestResponse,
  parsePointLocation,
} from "./db/supa";
export { InMemoryAirportDirectory } from "./db/memory";

export { buildApp } from "./app";
