/**
 * SmartTub API Types
 * Based on the JSON served by https://api.smarttub.io
 */

import type { HeatMode, LightMode, SecondaryFiltrationMode, TemperatureFormat } from '../settings.js';

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

/**
 * Decoded (unverified) access token payload
 */
export type TokenClaims = Record<string, unknown>;

/**
 * Authentication state held by the client after a successful login
 */
export interface Session {
  accessToken: string;
  tokenClaims: TokenClaims;
  expiresAt: Date;
  refreshToken: string;
  accountId: string;
}

/**
 * API client configuration
 */
export interface SmartTubClientConfig {
  authUrl?: string;           // Default: https://smarttub.auth0.com/oauth/token
  apiBaseUrl?: string;        // Default: https://api.smarttub.io
  clientId?: string;
  requestTimeoutMs?: number;  // Default: 30000
}

export interface AccountRecord {
  id: string;
  email: string;
  [key: string]: unknown;
}

export interface SpaRecord {
  id: string;
  brand: string;
  model: string;
  [key: string]: unknown;
}

/**
 * GET spas/{id}/status
 * Only the commonly used fields are named; everything else stays reachable by key
 */
export interface SpaStatus {
  state?: string;
  online?: boolean;
  heatMode?: HeatMode;
  setTemperature?: number;
  displayTemperatureFormat?: TemperatureFormat;
  secondaryFiltrationMode?: SecondaryFiltrationMode;
  water?: {
    temperature?: number;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

export type SpaDebugStatus = Record<string, unknown>;

export interface SpaError {
  code?: number;
  title?: string;
  description?: string;
  active?: boolean;
  [key: string]: unknown;
}

export interface PumpRecord {
  id: string;
  speed: string;
  state: string;
  type: string;
  [key: string]: unknown;
}

export interface LightColor {
  red: number;
  green: number;
  blue: number;
  white: number;
}

export interface LightRecord {
  zone: number;
  color: LightColor;
  intensity: number;
  mode: LightMode;
  [key: string]: unknown;
}

export interface ReminderRecord {
  id: string;
  lastUpdated: string;        // ISO-8601 timestamp
  name: string;
  remainingDuration: number;  // days
  snoozed: boolean;
  state: string;
  [key: string]: unknown;
}

export type EnergyUsageBucket = Record<string, unknown>;

/**
 * Base class for every error raised by this library
 */
export class SmartTubError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SmartTubError';
  }
}

/**
 * An API call was attempted before login()
 */
export class NotAuthenticatedError extends SmartTubError {
  constructor(message = 'Not logged in') {
    super(message);
    this.name = 'NotAuthenticatedError';
  }
}

/**
 * The authentication endpoint rejected the credentials or returned an unusable token
 */
export class AuthenticationError extends SmartTubError {
  constructor(
    message: string,
    public statusCode?: number,
  ) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/**
 * An authenticated request failed; statusCode is unset for network errors and timeouts
 */
export class ApiError extends SmartTubError {
  constructor(
    message: string,
    public statusCode?: number,
    public body?: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Client-side validation failed; no request was sent
 */
export class InvalidArgumentError extends SmartTubError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an arbitrary value to one of the allowed literals
 */
export function isOneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  return typeof value === 'string' && allowed.some((candidate) => candidate === value);
}

/**
 * Throw InvalidArgumentError unless value is one of the allowed literals
 */
export function assertOneOf<T extends string>(allowed: readonly T[], value: unknown, label: string): asserts value is T {
  if (!isOneOf(allowed, value)) {
    throw new InvalidArgumentError(`Invalid ${label}: ${String(value)} (expected one of ${allowed.join(', ')})`);
  }
}

export function isAccountRecord(value: unknown): value is AccountRecord {
  return isRecord(value) && typeof value.id === 'string' && typeof value.email === 'string';
}

export function isSpaRecord(value: unknown): value is SpaRecord {
  return (
    isRecord(value) && typeof value.id === 'string' && typeof value.brand === 'string' && typeof value.model === 'string'
  );
}
