// =====================================================
// APNs HTTP/2 Transport
// =====================================================
// The gateway only speaks HTTP/2. One session per origin is
// kept open and shared by every concurrent request; it is
// re-established lazily after the gateway closes it.

import http2, { ClientHttp2Session } from 'http2';
import { logger } from '../../utils/logger';
import type { PushRequest, PushResponse, PushTransport } from './types';

const DEFAULT_TIMEOUT_MS = 10_000;

export class Http2PushTransport implements PushTransport {
  private session: ClientHttp2Session | null = null;

  constructor(
    private readonly origin: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {}

  post(request: PushRequest): Promise<PushResponse> {
    const session = this.getSession();

    return new Promise<PushResponse>((resolve, reject) => {
      const stream = session.request({
        ':method': 'POST',
        ':path': request.path,
        'content-type': 'application/json',
        'content-length': Buffer.byteLength(request.body).toString(),
        ...request.headers,
      });

      let status = 0;
      let responseHeaders: Record<string, string | undefined> = {};
      const chunks: Buffer[] = [];

      stream.setTimeout(this.timeoutMs, () => {
        stream.close(http2.constants.NGHTTP2_CANCEL);
        reject(new Error(`APNs request timed out after ${this.timeoutMs}ms`));
      });

      stream.on('response', (headers) => {
        status = Number(headers[':status'] ?? 0);
        responseHeaders = {
          'apns-id': headerValue(headers['apns-id']),
          'retry-after': headerValue(headers['retry-after']),
        };
      });

      stream.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });

      stream.on('end', () => {
        resolve({
          status,
          body: Buffer.concat(chunks).toString('utf8'),
          headers: responseHeaders,
        });
      });

      stream.on('error', (error) => {
        reject(error);
      });

      stream.end(request.body);
    });
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;

    if (!session || session.closed || session.destroyed) {
      return;
    }

    await new Promise<void>((resolve) => {
      session.close(() => resolve());
    });
  }

  private getSession(): ClientHttp2Session {
    if (this.session && !this.session.closed && !this.session.destroyed) {
      return this.session;
    }

    const session = http2.connect(this.origin);

    session.on('error', (error) => {
      logger.warn('[ApnsTransport] Session error', { origin: this.origin, error });
    });

    session.on('goaway', () => {
      logger.debug('[ApnsTransport] Gateway sent GOAWAY, session will reconnect');
    });

    session.on('close', () => {
      if (this.session === session) {
        this.session = null;
      }
    });

    // Don't keep the process alive just for an idle gateway connection
    session.unref();

    this.session = session;
    return session;
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) return value[0];
  return value;
}
