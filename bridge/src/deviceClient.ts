// ============================================================================
// TsuryPhone Bridge - Device HTTP Client
// Request/response access to the device's HTTP API: one GET endpoint per
// snapshot category, a unified POST /action endpoint for mutations, and two
// configuration endpoints (/webhooks, /dnd). Every request is bounded by a
// fixed timeout; failures surface as DeviceRequestError.
// ============================================================================

import type { z } from 'zod';
import { DeviceRequestError, describeError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import {
  CATEGORY_ENDPOINTS,
  CATEGORY_SCHEMAS,
  deviceInfoSchema,
  type Category,
  type CategoryData,
  type DeviceInfo,
} from './schemas.js';

/** Per-request timeout in milliseconds */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/** Action names understood by POST /action */
export const ACTIONS = {
  call: 'call',
  hangup: 'hangup',
  ringPattern: 'ring_pattern',
  dndForce: 'dnd',
  dndSchedule: 'dnd_schedule',
  quickDialAdd: 'quick_dial_add',
  quickDialRemove: 'quick_dial_remove',
  blockedAdd: 'blocked_add',
  blockedRemove: 'blocked_remove',
  webhookAdd: 'webhook_add',
  webhookRemove: 'webhook_remove',
  callWaiting: 'call_waiting',
  refresh: 'refresh',
  maintenance: 'maintenance',
  reset: 'reset',
  setDeviceName: 'set_device_name',
} as const;

export type ActionName = (typeof ACTIONS)[keyof typeof ACTIONS];

/** Extra fields merged into an action body next to `action` */
export type ActionParams = Record<string, unknown>;

export class DeviceClient {
  /** http://host:port, no trailing slash */
  readonly baseUrl: string;
  private log: Logger;

  constructor(
    readonly host: string,
    readonly port: number,
    private readonly timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
  ) {
    this.baseUrl = `http://${host}:${port}`;
    this.log = createLogger(`DeviceClient ${host}:${port}`);
  }

  // --------------------------------------------------------------------------
  // Reads
  // --------------------------------------------------------------------------

  /** GET a category endpoint and validate its body */
  async getCategory<C extends Category>(category: C): Promise<CategoryData[C]> {
    const schema = CATEGORY_SCHEMAS[category];
    return this.getValidated(CATEGORY_ENDPOINTS[category], schema);
  }

  /** GET /: the identity document that confirms the host is a TsuryPhone */
  async getDeviceInfo(): Promise<DeviceInfo> {
    return this.getValidated('/', deviceInfoSchema);
  }

  // --------------------------------------------------------------------------
  // Writes
  // --------------------------------------------------------------------------

  /**
   * POST `{action, ...params}` to the unified action endpoint.
   * With no params the body is exactly `{action}`.
   */
  async postAction(action: ActionName, params?: ActionParams): Promise<void> {
    const payload: ActionParams = { ...(params ?? {}), action };
    this.log.debug(`Action ${action}`, params ?? {});
    await this.postJson('/action', payload);
  }

  /** POST a JSON body; any 2xx counts as success and the body is ignored */
  async postJson(endpoint: string, body: Record<string, unknown>): Promise<void> {
    await this.request('POST', endpoint, body);
  }

  // --------------------------------------------------------------------------
  // Internal helpers
  // --------------------------------------------------------------------------

  private async getValidated<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const raw = await this.request('GET', endpoint);

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new DeviceRequestError(`Invalid JSON from ${endpoint}`, 'invalid-payload', { cause: err });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new DeviceRequestError(
        `Unexpected payload from ${endpoint}: ${result.error.issues.map((i) => i.message).join(', ')}`,
        'invalid-payload',
      );
    }
    return result.data;
  }

  /**
   * Perform one HTTP request and return the response body as text.
   * Maps timeouts, connection failures, and non-2xx statuses to
   * DeviceRequestError.
   */
  private async request(method: 'GET' | 'POST', endpoint: string, body?: Record<string, unknown>): Promise<string> {
    const url = `${this.baseUrl}${endpoint}`;
    this.log.debug(`${method} ${url}`);

    let res: Response;
    let text: string;
    try {
      res = await fetch(url, {
        method,
        headers: body ? { 'Content-Type': 'application/json' } : undefined,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      // The timeout signal also covers reading the body
      text = await res.text();
    } catch (err) {
      throw transportError(err, method, url);
    }

    if (!res.ok) {
      throw new DeviceRequestError(`${method} ${endpoint} failed: HTTP ${res.status} ${text}`.trim(), 'http', {
        status: res.status,
      });
    }

    return text;
  }
}

/** Classify a fetch rejection as a timeout or a plain network failure */
function transportError(err: unknown, method: string, url: string): DeviceRequestError {
  if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
    return new DeviceRequestError(`Timeout during ${method} ${url}`, 'timeout', { cause: err });
  }
  return new DeviceRequestError(`Error during ${method} ${url}: ${describeError(err)}`, 'network', { cause: err });
}
