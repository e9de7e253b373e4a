import { createHmac } from 'node:crypto';
import { FETCH_TIMEOUT_MS } from '@milemark/common';

export const CALTOPO_URL = 'https://caltopo.com';
const SIGNATURE_TTL_MS = 120_000;
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded; charset=UTF-8';

export class CaltopoApiError extends Error {
  constructor(
    message: string,
    readonly status: number,
  ) {
    super(message);
    this.name = 'CaltopoApiError';
  }
}

export interface CaltopoCredentials {
  credentialId: string;
  /** Base64-encoded signing key paired with the credential id */
  key: string;
}

/**
 * Signed access to the CalTopo team API. Each request carries the credential id, an
 * expiry two minutes out and an HMAC-SHA256 signature of "METHOD endpoint\nexpires\nbody".
 */
export class CaltopoClient {
  constructor(
    private readonly credentials: CaltopoCredentials,
    private readonly baseUrl = CALTOPO_URL,
    private readonly now: () => number = Date.now,
  ) {}

  sign(method: 'GET' | 'POST', endpoint: string, expires: number, body = ''): string {
    return createHmac('sha256', Buffer.from(this.credentials.key, 'base64'))
      .update(`${method} ${endpoint}\n${expires}\n${body}`)
      .digest('base64');
  }

  async get(endpoint: string): Promise<unknown> {
    const expires = this.now() + SIGNATURE_TTL_MS;
    const params = new URLSearchParams({
      id: this.credentials.credentialId,
      expires: String(expires),
      signature: this.sign('GET', endpoint, expires),
    });
    return this.request(`${this.baseUrl}${endpoint}?${params.toString()}`, { method: 'GET' });
  }

  async post(endpoint: string, payload: object): Promise<unknown> {
    const json = JSON.stringify(payload);
    const expires = this.now() + SIGNATURE_TTL_MS;
    const body = new URLSearchParams({
      id: this.credentials.credentialId,
      expires: String(expires),
      signature: this.sign('POST', endpoint, expires, json),
      json,
    });
    return this.request(`${this.baseUrl}${endpoint}`, {
      method: 'POST',
      headers: { 'Content-Type': FORM_CONTENT_TYPE },
      body: body.toString(),
    });
  }

  private async request(url: string, init: RequestInit): Promise<unknown> {
    const response = await fetch(url, { ...init, signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
    if (!response.ok) {
      throw new CaltopoApiError(
        `CalTopo API error: ${response.status} ${response.statusText}`,
        response.status,
      );
    }
    return response.json();
  }
}
