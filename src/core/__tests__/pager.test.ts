import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { fetchAll, paginate } from '../pager';
import { CancelledError, FetchError } from '../../utils/errors';
import { FakeTransport, json, page, routes, text } from './fakes';

const itemSchema = z.object({ id: z.string() });
const BASE = 'https://graph.microsoft.com/v1.0';

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}

async function fetchFailure(promise: Promise<unknown>): Promise<FetchError> {
  const error = await rejection(promise);
  if (!(error instanceof FetchError)) {
    throw new Error(`expected FetchError, got ${String(error)}`);
  }
  return error;
}

function threePages() {
  return routes({
    'GET /users': () => json(page([{ id: 'a' }, { id: 'b' }], `${BASE}/users?$skiptoken=2`)),
    [`GET ${BASE}/users?$skiptoken=2`]: () => json(page([{ id: 'c' }, { id: 'd' }], `${BASE}/users?$skiptoken=3`)),
    [`GET ${BASE}/users?$skiptoken=3`]: () => json(page([{ id: 'e' }, { id: 'f' }])),
  });
}

describe('paginate', () => {
  it('returns every record of every page in server order', async () => {
    const transport = new FakeTransport(threePages());

    const records = await fetchAll(transport, '/users', itemSchema);

    expect(records.map((r) => r.id)).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
    expect(transport.urls()).toEqual(['/users', `${BASE}/users?$skiptoken=2`, `${BASE}/users?$skiptoken=3`]);
  });

  it('follows a cursor past an empty page', async () => {
    const transport = new FakeTransport(
      routes({
        'GET /users': () => json(page([], `${BASE}/users?$skiptoken=2`)),
        [`GET ${BASE}/users?$skiptoken=2`]: () => json(page([{ id: 'a' }])),
      })
    );

    const records = await fetchAll(transport, '/users', itemSchema);

    expect(records).toEqual([{ id: 'a' }]);
  });

  it('returns an empty list for an empty collection', async () => {
    const transport = new FakeTransport(routes({ 'GET /users': () => json(page([])) }));

    await expect(fetchAll(transport, '/users', itemSchema)).resolves.toEqual([]);
  });

  it('fetches lazily, one page at a time', async () => {
    const transport = new FakeTransport(threePages());

    const iterator = paginate(transport, '/users', itemSchema);
    const first = await iterator.next();

    expect(first.value).toEqual({ id: 'a' });
    expect(transport.requests).toHaveLength(1);
  });

  it('passes request headers on every page', async () => {
    const transport = new FakeTransport(threePages());

    await fetchAll(transport, '/users', itemSchema, { headers: { ConsistencyLevel: 'eventual' } });

    expect(transport.requests.map((r) => r.headers)).toEqual([
      { ConsistencyLevel: 'eventual' },
      { ConsistencyLevel: 'eventual' },
      { ConsistencyLevel: 'eventual' },
    ]);
  });

  it('maps 401 to Unauthorized with the response body', async () => {
    const transport = new FakeTransport(routes({ 'GET /users': () => text('token expired', 401) }));

    const error = await fetchFailure(fetchAll(transport, '/users', itemSchema));

    expect(error.kind).toBe('Unauthorized');
    expect(error.failure).toEqual({ kind: 'Unauthorized', body: 'token expired' });
    expect(error.message).toBe('Unauthorized fetching /users: token expired');
  });

  it('fails the whole fetch when a later page errors', async () => {
    const transport = new FakeTransport(
      routes({
        'GET /users': () => json(page([{ id: 'a' }], `${BASE}/users?$skiptoken=2`)),
        [`GET ${BASE}/users?$skiptoken=2`]: () => text('boom', 503),
      })
    );

    const error = await fetchFailure(fetchAll(transport, '/users', itemSchema));

    expect(error.failure).toEqual({ kind: 'RemoteError', status: 503, body: 'boom' });
    expect(error.url).toBe(`${BASE}/users?$skiptoken=2`);
  });

  it('maps a transport exception to RemoteError with status 0', async () => {
    const transport = new FakeTransport(() => {
      throw new Error('socket hang up');
    });

    const error = await fetchFailure(fetchAll(transport, '/users', itemSchema));

    expect(error.failure).toEqual({ kind: 'RemoteError', status: 0, body: 'socket hang up' });
  });

  it('maps a body that is not JSON to DecodeError', async () => {
    const transport = new FakeTransport(routes({ 'GET /users': () => text('<html>', 200) }));

    const error = await fetchFailure(fetchAll(transport, '/users', itemSchema));

    expect(error.kind).toBe('DecodeError');
  });

  it('maps a page without a value array to DecodeError', async () => {
    const transport = new FakeTransport(routes({ 'GET /users': () => json({ items: [] }) }));

    const error = await fetchFailure(fetchAll(transport, '/users', itemSchema));

    expect(error.failure).toEqual({ kind: 'DecodeError', detail: 'value: Required' });
    expect(error.message).toBe('Could not decode page from /users: value: Required');
  });

  it('refuses to return a truncated set when the page limit is reached', async () => {
    const transport = new FakeTransport(threePages());

    const error = await fetchFailure(fetchAll(transport, '/users', itemSchema, { maxPages: 2 }));

    expect(error.failure).toEqual({ kind: 'PageLimit', maxPages: 2 });
    expect(error.url).toBe(`${BASE}/users?$skiptoken=3`);
    expect(transport.requests).toHaveLength(2);
  });

  it('stops when a next link points back at a fetched page', async () => {
    const transport = new FakeTransport(
      routes({
        'GET /users': () => json(page([{ id: 'a' }], `${BASE}/users?$skiptoken=2`)),
        [`GET ${BASE}/users?$skiptoken=2`]: () => json(page([{ id: 'b' }], `${BASE}/users?$skiptoken=2`)),
      })
    );

    const error = await fetchFailure(fetchAll(transport, '/users', itemSchema));

    expect(error.failure).toEqual({ kind: 'DecodeError', detail: 'next link points at a page already fetched' });
    expect(transport.requests).toHaveLength(2);
  });

  it.each(['users', 'ftp://example.com/users', 'http://graph.example.com/users', '//evil.example.com/x'])(
    'rejects the start URL %s before any request',
    async (startUrl) => {
      const transport = new FakeTransport(threePages());

      const error = await rejection(fetchAll(transport, startUrl, itemSchema));

      expect(error).toBeInstanceOf(TypeError);
      expect(transport.requests).toHaveLength(0);
    }
  );

  it('does not start when already cancelled', async () => {
    const transport = new FakeTransport(threePages());
    const controller = new AbortController();
    controller.abort();

    const error = await rejection(fetchAll(transport, '/users', itemSchema, { signal: controller.signal }));

    expect(error).toBeInstanceOf(CancelledError);
    expect(transport.requests).toHaveLength(0);
  });

  it('stops at the next page boundary after cancellation', async () => {
    const controller = new AbortController();
    const handler = threePages();
    const transport = new FakeTransport((request) => {
      controller.abort();
      return handler(request);
    });

    const error = await rejection(fetchAll(transport, '/users', itemSchema, { signal: controller.signal }));

    expect(error).toBeInstanceOf(CancelledError);
    expect(transport.requests).toHaveLength(1);
  });

  it('hands the abort signal to every page request', async () => {
    const controller = new AbortController();
    const transport = new FakeTransport(threePages());

    await fetchAll(transport, '/users', itemSchema, { signal: controller.signal });

    expect(transport.requests.map((r) => r.signal)).toEqual([controller.signal, controller.signal, controller.signal]);
  });

  it('reports a request cut off by cancellation as cancelled', async () => {
    const controller = new AbortController();
    const transport = new FakeTransport(() => {
      controller.abort();
      throw new Error('This operation was aborted');
    });

    const error = await rejection(fetchAll(transport, '/users', itemSchema, { signal: controller.signal }));

    expect(error).toBeInstanceOf(CancelledError);
    expect(transport.requests).toHaveLength(1);
  });
});
