/**
 * Base API Client
 * ===============
 * Unified axios client base: request timing, structured logging and mapping
 * of transport failures onto FetchError. Requests are made once; a failed
 * call fails the run.
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { createPackageLogger, FetchError, LogHelpers } from '@rhodl-sync/utils';

const logger = createPackageLogger('@rhodl-sync/api-clients');

/**
 * Base API client configuration
 */
export interface BaseApiClientConfig {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  apiName?: string;
  /** Optional axios instance for testing */
  axiosInstance?: AxiosInstance;
}

type TimedRequestConfig = InternalAxiosRequestConfig & { _startTime?: number };

function elapsedSince(config: TimedRequestConfig | undefined): number {
  const startTime = config?._startTime;
  return startTime ? Date.now() - startTime : 0;
}

/**
 * Base API client; subclasses add typed endpoint methods
 */
export class BaseApiClient {
  protected axiosInstance: AxiosInstance;
  protected apiName: string;

  constructor(config: BaseApiClientConfig) {
    this.apiName = config.apiName || 'API';

    // Use injected axios instance or create a new one
    this.axiosInstance =
      config.axiosInstance ??
      axios.create({
        baseURL: config.baseURL,
        timeout: config.timeout || 30000,
        headers: {
          'Content-Type': 'application/json',
          ...config.headers,
        },
      });

    // Track start time for latency logging
    this.axiosInstance.interceptors.request.use(
      (requestConfig: TimedRequestConfig) => {
        requestConfig._startTime = Date.now();
        LogHelpers.apiRequest(
          logger,
          requestConfig.method?.toUpperCase() || 'GET',
          requestConfig.url || 'unknown',
          { apiName: this.apiName }
        );
        return requestConfig;
      },
      (error: unknown) => Promise.reject(error)
    );

    // Map every failure onto FetchError
    this.axiosInstance.interceptors.response.use(
      (response) => {
        const requestConfig: TimedRequestConfig = response.config;
        LogHelpers.apiResponse(
          logger,
          requestConfig.method?.toUpperCase() || 'GET',
          requestConfig.url || 'unknown',
          response.status,
          elapsedSince(requestConfig),
          { apiName: this.apiName }
        );
        return response;
      },
      (error: unknown) => {
        throw this.toFetchError(error);
      }
    );
  }

  /**
   * Translate an axios failure into a FetchError
   */
  protected toFetchError(error: unknown): FetchError {
    if (error instanceof FetchError) {
      return error;
    }

    if (!axios.isAxiosError(error)) {
      const message = error instanceof Error ? error.message : String(error);
      return new FetchError(`Request to ${this.apiName} failed: ${message}`, this.apiName, undefined, {}, error);
    }

    const axiosError: AxiosError = error;
    const requestConfig: TimedRequestConfig | undefined = axiosError.config;
    const context = {
      url: requestConfig?.url,
      method: requestConfig?.method,
      latencyMs: elapsedSince(requestConfig),
    };

    // Handle timeout
    if (axiosError.code === 'ECONNABORTED' || axiosError.code === 'ETIMEDOUT') {
      return new FetchError(
        `Request to ${this.apiName} timed out after ${this.axiosInstance.defaults.timeout ?? 0}ms`,
        this.apiName,
        undefined,
        context,
        error
      );
    }

    // Handle API errors
    if (axiosError.response) {
      const status = axiosError.response.status;
      LogHelpers.apiResponse(
        logger,
        requestConfig?.method?.toUpperCase() || 'GET',
        requestConfig?.url || 'unknown',
        status,
        context.latencyMs,
        { apiName: this.apiName }
      );
      return new FetchError(
        `${this.apiName} responded with HTTP ${status}${
          axiosError.response.statusText ? ` ${axiosError.response.statusText}` : ''
        }`,
        this.apiName,
        status,
        context,
        error
      );
    }

    // Handle network errors
    return new FetchError(
      `Network error calling ${this.apiName}: ${axiosError.message}`,
      this.apiName,
      undefined,
      context,
      error
    );
  }

  /**
   * GET request, returning the response body
   */
  async get<T = unknown>(url: string, config?: AxiosRequestConfig): Promise<T> {
    try {
      const response = await this.axiosInstance.request<T>({ ...config, method: 'GET', url });
      return response.data;
    } catch (error) {
      throw this.toFetchError(error);
    }
  }

  /**
   * Get axios instance for advanced usage
   */
  getAxiosInstance(): AxiosInstance {
    return this.axiosInstance;
  }
}
