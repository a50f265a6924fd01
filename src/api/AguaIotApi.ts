/**
 * Agua IoT API Client
 *
 * Thin HTTP layer over the Agua IoT platform. Adds the brand headers, maps
 * transport failures to NetworkError and hands back status and body; callers
 * decide what a status means.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse, Method } from 'axios';
import type { ResolvedOptions } from '../config';
import { NetworkError } from '../errors';

const HEADER_ACCEPT = 'application/json, text/javascript, */*; q=0.01';

export interface ApiResponse {
  status: number;
  data: unknown;
}

export class AguaIotApi {
  private readonly client: AxiosInstance;

  constructor(private readonly options: ResolvedOptions) {
    this.client = options.httpClient ?? axios.create({
      baseURL: options.apiUrl,
      timeout: options.timeout,
    });
  }

  /**
   * Headers sent with every request
   */
  private headers(extra: Record<string, string>): Record<string, string> {
    return {
      'Accept': HEADER_ACCEPT,
      'Content-Type': 'application/json',
      'Origin': 'file://',
      'id_brand': this.options.brandId,
      'customer_code': this.options.customerCode,
      ...extra,
    };
  }

  public async request(
    method: Extract<Method, 'GET' | 'POST'>,
    path: string,
    data: object = {},
    headers: Record<string, string> = {},
  ): Promise<ApiResponse> {
    this.options.log?.debug(`[AguaIotApi] ${method} ${path}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        baseURL: this.options.apiUrl,
        url: path,
        method,
        data,
        headers: this.headers(headers),
        timeout: this.options.timeout,
        maxRedirects: 0,
        validateStatus: () => true,
      });
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        const reason = error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT'
          ? `timed out after ${this.options.timeout} ms`
          : error.message;
        throw new NetworkError(`Connection to ${this.options.apiUrl}${path} not possible: ${reason}`, error);
      }
      throw error;
    }

    this.options.log?.debug(`[AguaIotApi] ${method} ${path} -> ${response.status}`);
    return { status: response.status, data: response.data };
  }
}
