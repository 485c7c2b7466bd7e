/**
 * AgentHttpClient: JSON-over-HTTP client for the server inside an agent
 * container, reached through its published host port.
 *
 * Uses Node.js built-in `node:http`. Every request carries a timeout and
 * resolves to a result value; transport errors never reject.
 */

import * as http from 'node:http';
import { createLogger, type Logger } from '../logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AgentClientOptions {
  /** Host the container ports are published on (default `127.0.0.1`). */
  host?: string;
  /** Per-request timeout in milliseconds (default 30_000). */
  timeoutMs?: number;
  logger?: Logger;
}

export type HttpResult =
  | { ok: true; status: number; body: unknown }
  | { ok: false; error: string };

/** Default request timeout: 30 seconds. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// AgentHttpClient
// ---------------------------------------------------------------------------

export class AgentHttpClient {
  private readonly host: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: AgentClientOptions = {}) {
    this.host = options.host ?? '127.0.0.1';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger('agent-client');
  }

  /**
   * POST a JSON body. A 2xx response with a JSON body is `ok`; anything
   * else (non-2xx, bad JSON, timeout, refused connection) is an error.
   */
  async postJson(port: number, path: string, body: unknown): Promise<HttpResult> {
    const response = await this.send(port, 'POST', path, JSON.stringify(body));
    if (!response.ok) return response;

    const { status, text } = response;
    if (status < 200 || status >= 300) {
      return { ok: false, error: `HTTP ${status} from ${path}: ${text.slice(0, 200)}` };
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return { ok: true, status, body: parsed };
    } catch {
      return { ok: false, error: `non-JSON response from ${path}` };
    }
  }

  /** True when `GET /health` answers 2xx. */
  async health(port: number): Promise<boolean> {
    const response = await this.send(port, 'GET', '/health');
    return response.ok && response.status >= 200 && response.status < 300;
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private send(
    port: number,
    method: string,
    path: string,
    payload?: string,
  ): Promise<{ ok: true; status: number; text: string } | { ok: false; error: string }> {
    return new Promise((resolve) => {
      const headers: Record<string, string> = { Accept: 'application/json' };
      if (payload !== undefined) {
        headers['Content-Type'] = 'application/json';
        headers['Content-Length'] = String(Buffer.byteLength(payload));
      }

      const req = http.request(
        { hostname: this.host, port, path, method, headers },
        (res) => {
          let data = '';
          res.setEncoding('utf-8');
          res.on('data', (chunk: string) => {
            data += chunk;
          });
          res.on('end', () => resolve({ ok: true, status: res.statusCode ?? 0, text: data }));
          res.on('error', (err) => resolve({ ok: false, error: err.message }));
        },
      );

      req.setTimeout(this.timeoutMs, () => {
        req.destroy(new Error(`${method} ${path} timed out after ${this.timeoutMs}ms`));
      });
      req.on('error', (err) => {
        this.logger.debug('request failed', { port, path, error: err.message });
        resolve({ ok: false, error: err.message });
      });

      if (payload !== undefined) {
        req.write(payload);
      }
      req.end();
    });
  }
}
