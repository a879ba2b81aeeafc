export { SmartTubClient } from './api/client.js';
export { Account } from './api/account.js';
export { Spa } from './api/spa.js';
export { SpaPump } from './api/pump.js';
export { SpaLight } from './api/light.js';
export { SpaReminder } from './api/reminder.js';
export {
  ApiError,
  AuthenticationError,
  InvalidArgumentError,
  NotAuthenticatedError,
  SmartTubError,
} from './api/types.js';
export type {
  AccountRecord,
  EnergyUsageBucket,
  HttpMethod,
  LightColor,
  LightRecord,
  PumpRecord,
  ReminderRecord,
  Session,
  SmartTubClientConfig,
  SpaDebugStatus,
  SpaError,
  SpaRecord,
  SpaStatus,
  TokenClaims,
} from './api/types.js';
export {
  ENERGY_USAGE_INTERVALS,
  HEAT_MODES,
  LIGHT_MODES,
  SECONDARY_FILTRATION_MODES,
  TEMPERATURE_FORMATS,
} from './settings.js';
export type {
  EnergyUsageInterval,
  HeatMode,
  LightMode,
  SecondaryFiltrationMode,
  TemperatureFormat,
} from './settings.js';
