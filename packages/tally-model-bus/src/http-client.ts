/**
 * http-client.ts - Single internal HTTP client for reasoning backend calls
 * -----------------------------------------------------------------------------
 * - Every outbound call to a vendor API goes through this module.
 * - Consistent timeouts and retries with exponential backoff.
 * - Retries transient failures only: network errors, timeouts, 429 and 5xx.
 *
 * INVARIANT: No other module makes HTTP calls to vendor APIs.
 * INVARIANT: Request headers (API keys) are never logged.
 */

import * as https from 'https';
import * as http from 'http';
import { URL } from 'url';

// ============================================================================
// HTTP Client Types
// ============================================================================

export interface HttpRequestOptions {
  method: 'GET' | 'POST';
  /** Full URL to call */
  url: string;
  headers: Record<string, string>;
  /** Request body (will be JSON stringified) */
  body?: unknown;
  timeout_ms?: number;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  /** Parsed JSON body, or the raw text when the body is not JSON */
  body: unknown;
  raw: string;
}

export interface HttpClientConfig {
  default_timeout_ms: number;
  /** Maximum retries for transient failures */
  max_retries: number;
  /** Base delay for exponential backoff in ms */
  retry_base_delay_ms: number;
}

const RETRYABLE_NETWORK_ERRORS = ['timed out', 'econnreset', 'econnrefused', 'socket hang up', 'epipe'];

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class ModelBusHttpClient {
  private config: HttpClientConfig;

  constructor(config?: Partial<HttpClientConfig>) {
    this.config = {
      default_timeout_ms: config?.default_timeout_ms ?? 60000,
      max_retries: config?.max_retries ?? 3,
      retry_base_delay_ms: config?.retry_base_delay_ms ?? 1000,
    };
  }

  /**
   * Make an HTTP request.
   *
   * A response with a retryable status is retried; once retries run out it is
   * returned as-is so the caller can report the vendor's error body.
   */
  async request(options: HttpRequestOptions): Promise<HttpResponse> {
    const timeout = options.timeout_ms ?? this.config.default_timeout_ms;
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.config.max_retries; attempt++) {
      const isLastAttempt = attempt === this.config.max_retries;

      try {
        const response = await this.doRequest(options, timeout);
        if (isLastAttempt || !isRetryableStatus(response.status)) {
          return response;
        }
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        if (isLastAttempt || !isRetryableError(lastError)) {
          throw lastError;
        }
      }

      const delay = this.config.retry_base_delay_ms * Math.pow(2, attempt);
      await this.sleep(delay);
    }

    throw lastError ?? new Error('Request failed after retries');
  }

  /**
   * Execute a single HTTP request
   */
  private doRequest(options: HttpRequestOptions, timeout: number): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
      const url = new URL(options.url);
      const isHttps = url.protocol === 'https:';
      const lib = isHttps ? https : http;

      const bodyStr = options.body !== undefined ? JSON.stringify(options.body) : undefined;

      const requestOptions: http.RequestOptions = {
        method: options.method,
        hostname: url.hostname,
        port: url.port || (isHttps ? 443 : 80),
        path: url.pathname + url.search,
        headers: {
          ...options.headers,
          ...(bodyStr ? { 'Content-Length': Buffer.byteLength(bodyStr) } : {}),
        },
        timeout,
      };

      const req = lib.request(requestOptions, (res) => {
        const chunks: Buffer[] = [];

        res.on('data', (chunk: Buffer) => {
          chunks.push(chunk);
        });

        res.on('end', () => {
          const raw = Buffer.concat(chunks).toString('utf8');

          const headers: Record<string, string> = {};
          for (const [key, value] of Object.entries(res.headers)) {
            if (value) {
              headers[key] = Array.isArray(value) ? value.join(', ') : value;
            }
          }

          resolve({
            status: res.statusCode ?? 0,
            headers,
            body: parseBody(raw),
            raw,
          });
        });

        res.on('error', (error) => {
          reject(new Error(`HTTP response failed: ${error.message}`));
        });
      });

      req.on('error', (error) => {
        reject(new Error(`HTTP request failed: ${error.message}`));
      });

      req.on('timeout', () => {
        req.destroy();
        reject(new Error(`Request timed out after ${timeout}ms`));
      });

      if (bodyStr) {
        req.write(bodyStr);
      }

      req.end();
    });
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function parseBody(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function isRetryableError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return RETRYABLE_NETWORK_ERRORS.some((fragment) => message.includes(fragment));
}
