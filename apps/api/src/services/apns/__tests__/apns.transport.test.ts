// =====================================================
// APNs HTTP/2 Transport Test Suite
// =====================================================
// Talks to a cleartext HTTP/2 server started in-process.

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import http2 from 'http2';
import { Http2PushTransport } from '../apns.transport';

interface ReceivedRequest {
  method: string | undefined;
  path: string | undefined;
  topic: string | undefined;
  body: string;
}

describe('Http2PushTransport', () => {
  const received: ReceivedRequest[] = [];
  let server: http2.Http2Server;
  let origin: string;

  beforeAll(async () => {
    server = http2.createServer();
    server.on('stream', (stream, headers) => {
      const chunks: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('end', () => {
        const path = headers[':path'];
        received.push({
          method: headers[':method'],
          path,
          topic: typeof headers['apns-topic'] === 'string' ? headers['apns-topic'] : undefined,
          body: Buffer.concat(chunks).toString('utf8'),
        });

        if (path === '/3/device/slow') {
          return;
        }
        if (path === '/3/device/gone') {
          stream.respond({ ':status': 410, 'apns-id': 'test-apns-id' });
          stream.end('{"reason":"Unregistered"}');
          return;
        }
        stream.respond({ ':status': 200, 'apns-id': 'test-apns-id' });
        stream.end();
      });
    });

    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('test server has no TCP address');
    }
    origin = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('posts the body and headers and returns the status', async () => {
    const transport = new Http2PushTransport(origin);

    const response = await transport.post({
      path: '/3/device/ok',
      headers: { 'apns-topic': 'com.example.relay.push-type.liveactivity' },
      body: '{"aps":{}}',
    });
    await transport.close();

    expect(response).toEqual({ status: 200, body: '', headers: { 'apns-id': 'test-apns-id', 'retry-after': undefined } });
    expect(received.find((r) => r.path === '/3/device/ok')).toEqual({
      method: 'POST',
      path: '/3/device/ok',
      topic: 'com.example.relay.push-type.liveactivity',
      body: '{"aps":{}}',
    });
  });

  it('returns error statuses with their body', async () => {
    const transport = new Http2PushTransport(origin);

    const response = await transport.post({ path: '/3/device/gone', headers: {}, body: '{}' });
    await transport.close();

    expect(response.status).toBe(410);
    expect(response.body).toBe('{"reason":"Unregistered"}');
  });

  it('rejects when the gateway does not answer in time', async () => {
    const transport = new Http2PushTransport(origin, 50);

    await expect(transport.post({ path: '/3/device/slow', headers: {}, body: '{}' })).rejects.toThrow(
      'APNs request timed out after 50ms',
    );
    await transport.close();
  });
});
