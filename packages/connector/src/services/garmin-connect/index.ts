/**
 * Garmin Connect Service
 */

export {
  EnvTokenProvider,
  GarminConnectSource,
  GARMIN_API_BASE,
} from "./api-client.js";
export type { GarminConnectOptions, TokenProvider } from "./api-client.js";

export {
  contentRevision,
  normalizeActivities,
  normalizeBodyBattery,
  normalizeSleep,
  normalizeSteps,
  normalizeStress,
  normalizeWeight,
} from "./normalize.js";
