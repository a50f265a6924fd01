/**
 * Configuration Types
 *
 * Options accepted when connecting, and their resolved form.
 */

import type { AxiosInstance } from 'axios';
import type { Logger } from './logger';
import {
  API_URL,
  DEFAULT_JOB_POLL_INTERVAL,
  DEFAULT_JOB_POLL_RETRIES,
  DEFAULT_REQUEST_TIMEOUT,
  DEFAULT_TOKEN_EXPIRY_MARGIN,
  EVA_CALOR_BRAND_ID,
  EVA_CALOR_CUSTOMER_CODE,
} from './settings';

export interface AguaIotOptions {
  apiUrl?: string;
  customerCode?: string;
  brandId?: string;

  /** Request timeout in ms; a request running longer fails with a NetworkError */
  timeout?: number;

  jobPollInterval?: number;
  jobPollRetries?: number;
  tokenExpiryMargin?: number;

  /**
   * Axios instance used for every request. One is created when omitted.
   */
  httpClient?: AxiosInstance;
  log?: Logger;

  /** Clock in ms since the epoch */
  now?: () => number;
}

export interface ResolvedOptions {
  apiUrl: string;
  customerCode: string;
  brandId: string;
  timeout: number;
  jobPollInterval: number;
  jobPollRetries: number;
  tokenExpiryMargin: number;
  httpClient?: AxiosInstance;
  log?: Logger;
  now: () => number;
}

export function resolveOptions(options: AguaIotOptions = {}): ResolvedOptions {
  return {
    apiUrl: options.apiUrl ?? API_URL,
    customerCode: options.customerCode ?? EVA_CALOR_CUSTOMER_CODE,
    brandId: options.brandId ?? EVA_CALOR_BRAND_ID,
    timeout: options.timeout ?? DEFAULT_REQUEST_TIMEOUT,
    jobPollInterval: options.jobPollInterval ?? DEFAULT_JOB_POLL_INTERVAL,
    jobPollRetries: options.jobPollRetries ?? DEFAULT_JOB_POLL_RETRIES,
    tokenExpiryMargin: options.tokenExpiryMargin ?? DEFAULT_TOKEN_EXPIRY_MARGIN,
    httpClient: options.httpClient,
    log: options.log,
    now: options.now ?? Date.now,
  };
}
