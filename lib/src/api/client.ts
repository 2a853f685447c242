/**
 * Management API Client
 *
 * Thin axios wrapper that paces every call through the rate governor,
 * retries 429 responses with backoff and maps failures onto the error
 * taxonomy: network errors and 5xx become TransientApiError, other 4xx
 * become ApiRequestError, and 404 is returned as `null`.
 */

import axios, { AxiosHeaders, type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import type { ApiConfig } from '../config/index.js';
import { ApiRequestError, TransientApiError } from '../errors/index.js';
import { type Logger, getComponentLogger } from '../logging/index.js';
import type { HeaderBag, RateGovernor } from '../rate-limit/index.js';
import type { ApiRequest } from './types.js';

export interface ManagementApiClientOptions {
  logger?: Logger;
  /** Replaces the HTTP transport; used to run the client in process */
  adapter?: AxiosAdapter;
}

export interface ApiResponse {
  status: number;
  data: unknown;
}

function toHeaderBag(response: AxiosResponse): HeaderBag {
  const { headers } = response;
  if (headers instanceof AxiosHeaders) {
    return headers.toJSON();
  }
  return { ...headers };
}

function describeBody(data: unknown): string {
  if (typeof data === 'string') {
    return data.slice(0, 200);
  }
  if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return '';
}

export class ManagementApiClient {
  private readonly http: AxiosInstance;
  private readonly governor: RateGovernor;
  private readonly logger: Logger;

  constructor(config: ApiConfig, governor: RateGovernor, options: ManagementApiClientOptions = {}) {
    this.governor = governor;
    this.logger = options.logger ?? getComponentLogger('api-client');
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        Authorization: `Bearer ${config.token}`,
        'Content-Type': 'application/json',
      },
      // Status codes are mapped below, never thrown by axios
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Perform one logical request, retrying through 429 responses
   *
   * @returns null on 404
   * @throws {RateLimitExceededError} after too many consecutive 429s
   * @throws {TransientApiError} on network failure or 5xx
   * @throws {ApiRequestError} on any other 4xx
   */
  async request(request: ApiRequest): Promise<ApiResponse | null> {
    const label = `${request.method} ${request.path}`;

    for (;;) {
      await this.governor.waitBeforeNextCall();

      let response: AxiosResponse;
      try {
        response = await this.http.request({
          method: request.method,
          url: request.path,
          params: request.params,
          data: request.body,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new TransientApiError(`${label} failed: ${message}`, undefined, error);
      }

      const headers = toHeaderBag(response);
      if (response.status === 429) {
        this.logger.debug('Received 429', { request: label });
        await this.governor.backoff(headers);
        continue;
      }

      this.governor.recordResponse(headers);
      this.logger.trace('API response', { request: label, status: response.status });

      if (response.status === 404) {
        return null;
      }
      if (response.status >= 500) {
        throw new TransientApiError(`${label} returned ${response.status}`, response.status);
      }
      if (response.status >= 400) {
        const detail = describeBody(response.data);
        throw new ApiRequestError(
          `${label} returned ${response.status}${detail ? `: ${detail}` : ''}`,
          response.status,
          response.data
        );
      }

      return { status: response.status, data: response.data };
    }
  }

  async get(path: string, params?: Record<string, string>): Promise<unknown> {
    const response = await this.request({ method: 'GET', path, ...(params ? { params } : {}) });
    return response ? response.data : null;
  }

  /**
   * @returns false when the resource does not exist
   */
  async delete(path: string, params?: Record<string, string>): Promise<boolean> {
    const response = await this.request({ method: 'DELETE', path, ...(params ? { params } : {}) });
    return response !== null;
  }

  /**
   * @returns false when the resource does not exist
   */
  async patch(path: string, body: unknown): Promise<boolean> {
    const response = await this.request({ method: 'PATCH', path, body });
    return response !== null;
  }

  getRateLimitStatus(): string {
    return this.governor.getStatusSummary();
  }
}
