import { pino } from 'pino';
import { beforeAll, describe, expect, it, vi } from 'vitest';

import { KeySetFetchError } from '../src/errors.js';
import type { KeySetResponse, KeySetTransport } from '../src/interfaces/index.js';
import { JWKSCache } from '../src/services/jwksCache.service.js';

import {
  createSigner,
  createStubTransport,
  keySetBody,
  publicJwk,
  type TestSigner,
} from './helpers/fixtures.js';

/** pino logger writing JSON lines into an array */
const createCapturingLogger = () => {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
};

describe('JWKSCache', () => {
  let first: TestSigner;
  let second: TestSigner;

  beforeAll(() => {
    first = createSigner('key-1');
    second = createSigner('key-2');
  });

  it('starts empty and never fetches on lookup', () => {
    const { transport, get } = createStubTransport();
    const cache = new JWKSCache(transport);

    expect(cache.lookup('key-1')).toBeUndefined();
    expect(cache.size).toBe(0);
    expect(get).not.toHaveBeenCalled();
  });

  it('fetches the well-known path and indexes keys by kid', async () => {
    const { transport, get } = createStubTransport({
      status: 200,
      body: await keySetBody(first, second),
    });
    const cache = new JWKSCache(transport);

    await cache.fetch();

    expect(get).toHaveBeenCalledWith('/.well-known/jwks.json', undefined);
    expect(cache.keyIds()).toEqual(['key-1', 'key-2']);
    expect(cache.lookup('key-2')?.exponent).toBe(65537);
  });

  it('uses a custom path and forwards the abort signal', async () => {
    const { transport, get } = createStubTransport({ status: 200, body: await keySetBody(first) });
    const cache = new JWKSCache(transport, undefined, '/keys');
    const controller = new AbortController();

    await cache.fetch(controller.signal);

    expect(get).toHaveBeenCalledWith('/keys', controller.signal);
  });

  it('drops non-RSA keys and skips RSA keys that fail to decode', async () => {
    const { logger, lines } = createCapturingLogger();
    const { transport } = createStubTransport({
      status: 200,
      body: {
        keys: [
          { kid: 'ec-1', kty: 'EC', crv: 'P-256', x: 'x', y: 'y' },
          { kid: 'bad-exp', kty: 'RSA', n: 'AQAB', e: 'AQAAAAA' },
          { kid: 'no-n', kty: 'RSA', e: 'AQAB' },
          await publicJwk(first),
        ],
      },
    });
    const cache = new JWKSCache(transport, logger);

    await cache.fetch();

    expect(cache.keyIds()).toEqual(['key-1']);
    const warnings = lines.filter((line) => line.level === 40);
    expect(warnings.map((line) => line.msg)).toEqual([
      'JWK to RSA failed',
      'JWK to RSA: malformed key',
    ]);
    expect(warnings[0]).toMatchObject({ kid: 'bad-exp', error: 'JWK exponent too large' });
  });

  it('fails when no usable key remains', async () => {
    const { transport } = createStubTransport({
      status: 200,
      body: { keys: [{ kid: 'ec-1', kty: 'EC' }] },
    });
    const cache = new JWKSCache(transport);

    await expect(cache.fetch()).rejects.toThrow(new KeySetFetchError('JWKS fetch: empty key set'));
  });

  it('fails on a status other than 200', async () => {
    const { transport } = createStubTransport({ status: 503, body: undefined });
    const cache = new JWKSCache(transport);

    await expect(cache.fetch()).rejects.toThrow('JWKS fetch: expected 200, got 503');
  });

  it('fails on a body that is not a key set', async () => {
    const { transport } = createStubTransport({ status: 200, body: { keys: 'none' } });
    const cache = new JWKSCache(transport);

    await expect(cache.fetch()).rejects.toThrow('JWKS fetch: invalid key set format');
  });

  it('wraps transport errors and logs their reason', async () => {
    const { logger, lines } = createCapturingLogger();
    const get = vi.fn<KeySetTransport['get']>().mockRejectedValue(new Error('connect ECONNREFUSED'));
    const cache = new JWKSCache({ get }, logger);

    const rejection = cache.fetch();
    await expect(rejection).rejects.toBeInstanceOf(KeySetFetchError);
    await expect(rejection).rejects.toThrow('JWKS fetch: connect ECONNREFUSED');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 50,
      msg: 'JWKS request failed',
      path: '/.well-known/jwks.json',
      err: { type: 'Error', message: 'connect ECONNREFUSED' },
    });
  });

  it('stores an RSA key without kid under the empty key id', async () => {
    const { kid: _kid, ...anonymous } = await publicJwk(first);
    const { transport } = createStubTransport({ status: 200, body: { keys: [anonymous] } });
    const cache = new JWKSCache(transport);

    await cache.fetch();

    expect(cache.keyIds()).toEqual(['']);
    expect(cache.lookup('')?.exponent).toBe(65537);
  });

  it('keeps the previous key set when a refresh fails', async () => {
    const { transport } = createStubTransport(
      { status: 200, body: await keySetBody(first) },
      { status: 500, body: undefined },
    );
    const cache = new JWKSCache(transport);

    await cache.fetch();
    await expect(cache.fetch()).rejects.toThrow(KeySetFetchError);

    expect(cache.keyIds()).toEqual(['key-1']);
  });

  it('replaces the key set wholesale on refresh', async () => {
    const { transport } = createStubTransport(
      { status: 200, body: await keySetBody(first) },
      { status: 200, body: await keySetBody(second) },
    );
    const cache = new JWKSCache(transport);

    await cache.fetch();
    await cache.fetch();

    expect(cache.lookup('key-1')).toBeUndefined();
    expect(cache.keyIds()).toEqual(['key-2']);
  });

  it('serves the old key set while a refresh is in flight', async () => {
    let release: (response: KeySetResponse) => void = () => {};
    const pending = new Promise<KeySetResponse>((resolve) => {
      release = resolve;
    });
    const get = vi
      .fn<KeySetTransport['get']>()
      .mockResolvedValueOnce({ status: 200, body: await keySetBody(first) })
      .mockReturnValueOnce(pending);
    const cache = new JWKSCache({ get });
    await cache.fetch();

    const refresh = cache.fetch();
    expect(cache.lookup('key-1')).toBeDefined();
    expect(cache.lookup('key-2')).toBeUndefined();

    release({ status: 200, body: await keySetBody(second) });
    await refresh;

    expect(cache.lookup('key-1')).toBeUndefined();
    expect(cache.lookup('key-2')).toBeDefined();
  });

  it('fails without touching the key set when the request is aborted', async () => {
    const get = vi.fn<KeySetTransport['get']>(
      (_path, signal) =>
        new Promise<KeySetResponse>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new Error('request cancelled')));
        }),
    );
    const cache = new JWKSCache({ get });
    const controller = new AbortController();

    const rejection = cache.fetch(controller.signal);
    controller.abort();

    await expect(rejection).rejects.toThrow('JWKS fetch: request cancelled');
    expect(cache.size).toBe(0);
  });

  it('fails on an aborted signal even when the transport ignores it', async () => {
    const { transport, get } = createStubTransport({
      status: 200,
      body: await keySetBody(first),
    });
    const cache = new JWKSCache(transport);
    const controller = new AbortController();
    controller.abort();

    const rejection = cache.fetch(controller.signal);

    await expect(rejection).rejects.toBeInstanceOf(KeySetFetchError);
    await expect(rejection).rejects.toThrow('JWKS fetch: This operation was aborted');
    expect(get).not.toHaveBeenCalled();
    expect(cache.size).toBe(0);
  });

  it('discards a response that arrives after the signal fired', async () => {
    let release: (response: KeySetResponse) => void = () => {};
    const pending = new Promise<KeySetResponse>((resolve) => {
      release = resolve;
    });
    const get = vi
      .fn<KeySetTransport['get']>()
      .mockResolvedValueOnce({ status: 200, body: await keySetBody(first) })
      .mockReturnValueOnce(pending);
    const cache = new JWKSCache({ get });
    await cache.fetch();
    const controller = new AbortController();

    const refresh = cache.fetch(controller.signal);
    controller.abort();
    release({ status: 200, body: await keySetBody(second) });

    await expect(refresh).rejects.toBeInstanceOf(KeySetFetchError);
    expect(cache.keyIds()).toEqual(['key-1']);
  });
});
