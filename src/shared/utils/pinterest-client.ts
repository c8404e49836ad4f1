// Pinterest REST client
import { config } from './environment';
import { ConfigurationError, PublishError, errorMessage } from './error-handling';

const API_TIMEOUT = 30000; // 30 seconds

/**
 * Supplies a valid bearer token; acquiring and refreshing it happens elsewhere
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Reads the token from PINTEREST_ACCESS_TOKEN
 */
export class EnvAccessTokenProvider implements AccessTokenProvider {
  constructor(private readonly variableName: string = 'PINTEREST_ACCESS_TOKEN') {}

  async getAccessToken(): Promise<string> {
    const token = process.env[this.variableName];
    if (!token || token.trim() === '') {
      throw new ConfigurationError(`${this.variableName} is not configured`, { setting: this.variableName });
    }
    return token.trim();
  }
}

export interface PinterestResponse {
  status: number;
  body: string;
  data: unknown;
}

export interface PinterestClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/**
 * Thin fetch wrapper over the v5 API; non-2xx answers raise PublishError
 */
export class PinterestClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly tokenProvider: AccessTokenProvider,
    options: PinterestClientOptions = {}
  ) {
    this.baseUrl = (options.baseUrl ?? config.pinterestApiBaseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? API_TIMEOUT;
  }

  /**
   * Fails with ConfigurationError when no token can be obtained
   */
  async assertAuthorized(): Promise<void> {
    await this.tokenProvider.getAccessToken();
  }

  async request(method: 'GET' | 'POST' | 'PATCH', path: string, payload?: unknown): Promise<PinterestResponse> {
    const accessToken = await this.tokenProvider.getAccessToken();
    const url = `${this.baseUrl}${path}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        signal: AbortSignal.timeout(this.timeoutMs),
        headers: {
          'Authorization': `Bearer ${accessToken}`,
          'Content-Type': 'application/json'
        },
        ...(payload !== undefined ? { body: JSON.stringify(payload) } : {})
      });
    } catch (error) {
      const reason = error instanceof Error && error.name === 'TimeoutError' ? 'Request timeout' : errorMessage(error);
      throw new PublishError(`${method} ${path} failed: ${reason}`, 0, '');
    }

    const body = await response.text();

    if (!response.ok) {
      throw new PublishError(`${method} ${path} returned HTTP ${response.status}`, response.status, body);
    }

    return { status: response.status, body, data: parseJson(body) };
  }
}

function parseJson(body: string): unknown {
  if (body.trim() === '') {
    return null;
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    console.warn('Pinterest answered with a non-JSON body', { error: errorMessage(error) });
    return null;
  }
}

/**
 * Reads the `id` field of a create response, null when there is none
 */
export function readResponseId(data: unknown): string | null {
  if (data !== null && typeof data === 'object' && 'id' in data) {
    const id = data.id;
    if (typeof id === 'string' && id.trim() !== '') {
      return id;
    }
    if (typeof id === 'number') {
      return id.toString();
    }
  }
  return null;
}
