export interface HttpRequestOptions {
  headers: Record<string, string>;
  timeoutSeconds: number;
  /** Rejects with `HttpResponseTooLargeError` when the declared `content-length` exceeds it. */
  maxBytes?: number;
}

export interface HttpResponse {
  statusCode: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: Buffer;
}

export interface HttpClient {
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}

export class HttpTransportError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly timedOut: boolean
  ) {
    super(message);
    this.name = 'HttpTransportError';
  }
}

export class HttpResponseTooLargeError extends Error {
  constructor(
    readonly url: string,
    readonly contentLength: number,
    readonly maxBytes: number
  ) {
    super(`Resposta de ${contentLength} bytes excede o limite de ${maxBytes} bytes`);
    this.name = 'HttpResponseTooLargeError';
  }
}

export class FetchHttpClient implements HttpClient {
  async get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: options.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(Math.max(1, options.timeoutSeconds) * 1000)
      });
    } catch (error) {
      throw toTransportError(error, url);
    }

    const declaredLength = Number(response.headers.get('content-length'));
    if (options.maxBytes !== undefined && Number.isFinite(declaredLength) && declaredLength > options.maxBytes) {
      await response.body?.cancel();
      throw new HttpResponseTooLargeError(url, declaredLength, options.maxBytes);
    }

    let body: Buffer;
    try {
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw toTransportError(error, url);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      headers[name.toLowerCase()] = value;
    });

    return {
      statusCode: response.status,
      headers,
      body
    };
  }
}

function toTransportError(error: unknown, url: string): HttpTransportError {
  const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
  const message = error instanceof Error ? error.message : String(error);
  return new HttpTransportError(timedOut ? `Tempo limite excedido para ${url}` : message, url, timedOut);
}

export function buildRequestHeaders(input: {
  accept: string;
  userAgent: string;
  authToken: string | null;
}): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: input.accept,
    'User-Agent': input.userAgent
  };

  if (input.authToken) {
    headers.Authorization = `Bearer ${input.authToken}`;
  }

  return headers;
}
