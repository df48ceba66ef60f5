/**
 * Client for the media repository admin "attributes" endpoint
 *
 *   POST /_matrix/media/unstable/admin/media/<server>/<media id>/attributes?access_token=<token>
 *   {"purpose": "pinned" | "none"}
 *
 * Media with purpose `pinned` survives the repository's purge job.
 */

import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../../lib/errors';
import { logger } from '../../utils/logger';

/** `pinned` media survives the repository purge; `none` clears the pin */
export type MediaPurpose = 'pinned' | 'none';

export const DEFAULT_REQUEST_TIMEOUT_MS = 600_000;

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

/**
 * Outcome of one attribute update. Any HTTP status is a `response`;
 * `transport-failure` means no response arrived (refused, DNS, timeout).
 */
export type SetPurposeResult =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'transport-failure'; description: string };

export interface MediaAttributesClientOptions {
  /** Server name the media IDs belong to, e.g. `example.org` or `localhost:8008` */
  server: string;
  accessToken: string;
  /** Sent as X-Forwarded-Host when talking to a loopback reverse proxy */
  forwardedHost: string;
  timeoutMs?: number;
}

export function isLoopbackServer(server: string): boolean {
  try {
    return LOOPBACK_HOSTS.has(new URL(`http://${server}`).hostname);
  } catch {
    return false;
  }
}

export function buildAttributesUrl(server: string, mediaId: string, accessToken: string): string {
  const base = isLoopbackServer(server) ? `http://${server}` : `https://matrix.${server}`;
  const endpoint = `${base}/_matrix/media/unstable/admin/media/${server}/${encodeURIComponent(mediaId)}/attributes`;
  const query = new URLSearchParams({ access_token: accessToken });
  return `${endpoint}?${query.toString()}`;
}

export function redactAccessToken(url: string): string {
  return url.replace(/([?&]access_token=)[^&]*/, '$1***');
}

export function isSuccess(result: SetPurposeResult): boolean {
  return result.kind === 'response' && result.status >= 200 && result.status < 300;
}

/**
 * HTTP status of the result; 0 when the request never got a response.
 */
export function statusOf(result: SetPurposeResult): number {
  return result.kind === 'response' ? result.status : 0;
}

/**
 * Pretty-print a JSON error body, or return it unchanged when it is not JSON.
 */
export function formatResponseBody(body: string): string {
  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return body;
  }
}

export class MediaAttributesClient {
  private readonly server: string;
  private readonly accessToken: string;
  private readonly forwardedHost: string;
  private readonly loopback: boolean;
  private readonly client: AxiosInstance;

  constructor(options: MediaAttributesClientOptions) {
    this.server = options.server;
    this.accessToken = options.accessToken;
    this.forwardedHost = options.forwardedHost;
    this.loopback = isLoopbackServer(options.server);

    this.client = axios.create({
      timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      // A loopback reverse proxy is reached directly, never via HTTP(S)_PROXY
      proxy: this.loopback ? false : undefined,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  urlFor(mediaId: string): string {
    return buildAttributesUrl(this.server, mediaId, this.accessToken);
  }

  /**
   * One-line preview of the request, with the access token hidden
   */
  describeRequest(mediaId: string, purpose: MediaPurpose): string {
    return `POST ${redactAccessToken(this.urlFor(mediaId))} body=${JSON.stringify({ purpose })}`;
  }

  async setPurpose(mediaId: string, purpose: MediaPurpose): Promise<SetPurposeResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.loopback) {
      headers['X-Forwarded-Host'] = this.forwardedHost;
    }

    try {
      const response = await this.client.post<unknown>(this.urlFor(mediaId), JSON.stringify({ purpose }), {
        headers,
      });
      const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
      logger.debug(`Set purpose=${purpose} on ${mediaId}: HTTP ${response.status}`);
      return { kind: 'response', status: response.status, body };
    } catch (error) {
      logger.debug(`Request for ${mediaId} failed before a response: ${errorMessage(error)}`);
      return { kind: 'transport-failure', description: errorMessage(error) };
    }
  }
}
