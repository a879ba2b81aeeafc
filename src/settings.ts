/**
 * OAuth token endpoint used for the password-realm login
 */
export const AUTH_URL = 'https://smarttub.auth0.com/oauth/token';

export const AUTH_AUDIENCE = 'https://api.operation-link.com/';

/**
 * Public client id of the SmartTub mobile app
 */
export const AUTH_CLIENT_ID = 'dB7Rcp3rfKKh0vHw2uqkwOZmRb5WNjQC';

export const AUTH_REALM = 'Username-Password-Authentication';

export const AUTH_GRANT_TYPE = 'http://auth0.com/oauth/grant-type/password-realm';

export const AUTH_SCOPE = 'openid email offline_access User Admin';

/**
 * Token claim holding the account id
 */
export const AUTH_ACCOUNT_ID_CLAIM = 'http://operation-link.com/account_id';

export const API_BASE_URL = 'https://api.smarttub.io';

/**
 * Default timeout for a single HTTP request, in milliseconds
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const SECONDARY_FILTRATION_MODES = ['FREQUENT', 'INFREQUENT', 'AWAY'] as const;

export const HEAT_MODES = ['ECONOMY', 'DAY', 'AUTO'] as const;

export const TEMPERATURE_FORMATS = ['FAHRENHEIT', 'CELSIUS'] as const;

export const ENERGY_USAGE_INTERVALS = ['DAY', 'MONTH'] as const;

/**
 * Light modes accepted by PATCH spas/{id}/lights/{zone}
 * OFF must be paired with intensity 0, every other mode with a non-zero intensity
 */
export const LIGHT_MODES = [
  'PURPLE',
  'ORANGE',
  'RED',
  'YELLOW',
  'GREEN',
  'AQUA',
  'BLUE',
  'HIGH_SPEED_WHEEL',
  'OFF',
] as const;

export type SecondaryFiltrationMode = (typeof SECONDARY_FILTRATION_MODES)[number];
export type HeatMode = (typeof HEAT_MODES)[number];
export type TemperatureFormat = (typeof TEMPERATURE_FORMATS)[number];
export type EnergyUsageInterval = (typeof ENERGY_USAGE_INTERVALS)[number];
export type LightMode = (typeof LIGHT_MODES)[number];
