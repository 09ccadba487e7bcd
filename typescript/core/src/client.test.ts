import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { LiveViewClient } from './client';
import type { ConnectOptions } from './client';
import { ConnectionError, LiveViewError, SubscriptionError } from './types';
import type { ConnectionState } from './types';
import { listView, stateView } from './views';
import { createFakeTransport, silentLogger } from './testing/fake-transport';

interface Token {
  id: { mint: string };
  state: { price?: number; status?: string };
}

const stack = {
  name: 'tokens',
  url: 'ws://stack.test',
  views: {
    Token: {
      state: stateView<Token>('Token/state'),
      list: listView<Token>('Token/list'),
    },
  },
};

function token(mint: string, state: Token['state']): Token {
  return { id: { mint }, state };
}

async function connectClient(options: ConnectOptions = {}) {
  const fake = createFakeTransport();
  const connecting = LiveViewClient.connect(stack, { transport: fake.factory, logger: silentLogger(), ...options });
  fake.latest().open();
  const client = await connecting;
  return { client, fake, socket: fake.latest() };
}

describe('LiveViewClient SDK', () => {
  it('should export LiveViewClient class', async () => {
    const { LiveViewClient: Exported } = await import('./index');
    expect(Exported).toBe(LiveViewClient);
    expect(typeof Exported.connect).toBe('function');
  });
});

describe('LiveViewClient', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('requires a url from the options or the stack', async () => {
    const fake = createFakeTransport();
    await expect(
      LiveViewClient.connect({ name: 'empty', views: {} }, { transport: fake.factory })
    ).rejects.toMatchObject({ code: 'INVALID_CONFIG' });
    expect(fake.sockets).toHaveLength(0);
  });

  it('connects later when autoConnect is off', async () => {
    const fake = createFakeTransport();
    const client = await LiveViewClient.connect(stack, {
      transport: fake.factory,
      autoConnect: false,
      logger: silentLogger(),
    });
    expect(client.connectionState).toBe('disconnected');
    expect(client.stackName).toBe('tokens');
    expect(fake.sockets).toHaveLength(0);

    const connecting = client.connect();
    fake.latest().open();
    await connecting;

    expect(client.isConnected()).toBe(true);
    client.disconnect();
  });

  describe('state views', () => {
    it('reports not loaded, loaded and confirmed absent from getSync', async () => {
      const { client, socket } = await connectClient();
      const view = client.views.Token.state;

      expect(view.getSync('t1')).toBeUndefined();
      const watching = view.watch('t2')[Symbol.asyncIterator]();

      socket.receive({
        mode: 'state',
        entity: 'Token/state',
        op: 'snapshot',
        key: 't1',
        data: [{ key: 't1', data: token('t1', { price: 1 }) }],
      });
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'snapshot', key: 't2', data: [] });

      expect(view.getSync('t1')).toEqual(token('t1', { price: 1 }));
      expect(view.getSync('t2')).toBeNull();

      await watching.return?.();
      expect(view.getSync('t2')).toBeUndefined();
      client.disconnect();
    });

    it('reads an evicted key as not loaded', async () => {
      const { client, socket } = await connectClient({ maxEntriesPerView: 1 });
      const view = client.views.Token.state;

      socket.receive({ mode: 'state', entity: 'Token/state', op: 'upsert', key: 't1', data: token('t1', {}) });
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'upsert', key: 't3', data: token('t3', {}) });

      expect(view.getSync('t1')).toBeUndefined();
      expect(view.getSync('t3')).toEqual(token('t3', {}));
      client.disconnect();
    });

    it('reads a cached entity that fails the query as null', async () => {
      const { client, socket } = await connectClient();
      const view = client.views.Token.state;
      socket.receive({
        mode: 'state',
        entity: 'Token/state',
        op: 'upsert',
        key: 't1',
        data: token('t1', { price: 1, status: 'closed' }),
      });

      expect(view.getSync('t1', { where: { 'state.status': 'live' } })).toBeNull();
      await expect(view.get('t1', { where: { 'state.status': 'live' } })).resolves.toBeNull();
      expect(view.getSync('t1', { where: { 'state.status': 'closed' } })).toEqual(token('t1', { price: 1, status: 'closed' }));
      expect(socket.messages()).toEqual([]);
      client.disconnect();
    });

    it('waits for the first response in get() and then releases the subscription', async () => {
      const { client, socket } = await connectClient();

      const pending = client.views.Token.state.get('t1');
      expect(socket.messages()).toEqual([{ type: 'subscribe', view: 'Token/state', key: 't1' }]);

      socket.receive({
        mode: 'state',
        entity: 'Token/state',
        op: 'snapshot',
        key: 't1',
        data: [{ key: 't1', data: token('t1', { price: 4 }) }],
      });

      await expect(pending).resolves.toEqual(token('t1', { price: 4 }));
      expect(socket.messages()).toEqual([
        { type: 'subscribe', view: 'Token/state', key: 't1' },
        { type: 'unsubscribe', view: 'Token/state', key: 't1' },
      ]);
      client.disconnect();
    });

    it('resolves get() with null for a confirmed absent key', async () => {
      const { client, socket } = await connectClient();

      const pending = client.views.Token.state.get('missing');
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'snapshot', key: 'missing', data: [] });

      await expect(pending).resolves.toBeNull();
      client.disconnect();
    });

    it('rejects get() on a subscription error', async () => {
      const { client, socket } = await connectClient();

      const pending = client.views.Token.state.get('t9');
      socket.receive({ op: 'error', view: 'Token/state', key: 't9', message: 'unknown key' });

      await expect(pending).rejects.toBeInstanceOf(SubscriptionError);
      client.disconnect();
    });

    it('rejects get() when the connection fails first', async () => {
      const { client, socket } = await connectClient();

      const pending = client.views.Token.state.get('t1');
      socket.drop(4003, 'forbidden');

      await expect(pending).rejects.toBeInstanceOf(ConnectionError);
      expect(client.connectionState).toBe('error');
    });

    it('rejects get() with the abort reason', async () => {
      const { client } = await connectClient();
      const controller = new AbortController();

      const pending = client.views.Token.state.get('t1', { signal: controller.signal });
      controller.abort(new Error('stop waiting'));

      await expect(pending).rejects.toThrow('stop waiting');
      client.disconnect();
    });

    it('replays the cached entity before new changes in use()', async () => {
      const { client, socket } = await connectClient();
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'upsert', key: 't1', data: token('t1', { price: 1 }) });

      const iterator = client.views.Token.state.use('t1')[Symbol.asyncIterator]();
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'patch', key: 't1', data: { state: { price: 2 } } });
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'upsert', key: 't2', data: token('t2', {}) });

      expect(await iterator.next()).toEqual({ value: token('t1', { price: 1 }), done: false });
      expect(await iterator.next()).toEqual({ value: token('t1', { price: 2 }), done: false });
      await iterator.return?.();
      client.disconnect();
    });

    it('reports the value before and after each change in watchRich()', async () => {
      const { client, socket } = await connectClient();
      const iterator = client.views.Token.state.watchRich('t1')[Symbol.asyncIterator]();

      socket.receive({ mode: 'state', entity: 'Token/state', op: 'upsert', key: 't1', data: { state: { price: 1 } } });
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'patch', key: 't1', data: { state: { price: 2 } } });
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'upsert', key: 't2', data: { state: { price: 7 } } });
      socket.receive({ mode: 'state', entity: 'Token/state', op: 'delete', key: 't1' });

      expect(await iterator.next()).toEqual({
        value: { type: 'created', key: 't1', data: { state: { price: 1 } } },
        done: false,
      });
      expect(await iterator.next()).toEqual({
        value: {
          type: 'updated',
          key: 't1',
          before: { state: { price: 1 } },
          after: { state: { price: 2 } },
          patch: { state: { price: 2 } },
        },
        done: false,
      });
      expect(await iterator.next()).toEqual({
        value: { type: 'deleted', key: 't1', lastKnown: { state: { price: 2 } } },
        done: false,
      });
      await iterator.return?.();
      client.disconnect();
    });
  });

  describe('list views', () => {
    const LiveToken = z.object({
      id: z.object({ mint: z.string() }),
      state: z.object({ price: z.number() }),
    });

    it('never emits entities that fail the where clause or schema', async () => {
      const { client, socket } = await connectClient();
      const liveTokens = client.views.Token.list.use({ schema: LiveToken, where: { 'state.status': 'live' } });
      const iterator = liveTokens[Symbol.asyncIterator]();

      socket.receive({ mode: 'list', entity: 'Token/list', op: 'upsert', key: 't1', data: token('t1', { price: 1, status: 'live' }) });
      socket.receive({ mode: 'list', entity: 'Token/list', op: 'upsert', key: 't2', data: { state: { status: 'live' } } });
      socket.receive({ mode: 'list', entity: 'Token/list', op: 'upsert', key: 't3', data: token('t3', { price: 3, status: 'closed' }) });
      socket.receive({ mode: 'list', entity: 'Token/list', op: 'patch', key: 't1', data: { state: { price: 2 } } });

      expect(await iterator.next()).toEqual({ value: { id: { mint: 't1' }, state: { price: 1 } }, done: false });
      expect(await iterator.next()).toEqual({ value: { id: { mint: 't1' }, state: { price: 2 } }, done: false });
      await iterator.return?.();
      expect(client.store.size('Token/list')).toBe(3);
      client.disconnect();
    });

    it('returns the first limit matches from get()', async () => {
      const { client, socket } = await connectClient();
      expect(client.views.Token.list.getSync()).toBeUndefined();

      socket.receive({
        mode: 'list',
        entity: 'Token/list',
        op: 'snapshot',
        data: [
          { key: 'a', data: token('a', { price: 1 }) },
          { key: 'b', data: token('b', { price: 2 }) },
          { key: 'c', data: token('c', { price: 3 }) },
        ],
      });

      await expect(client.views.Token.list.get({ limit: 2 })).resolves.toEqual([
        token('a', { price: 1 }),
        token('b', { price: 2 }),
      ]);
      expect(client.views.Token.list.getSync({ where: { 'state.price': { gt: 2 } } })).toEqual([
        token('c', { price: 3 }),
      ]);
      client.disconnect();
    });

    it('ends the sequence when its signal aborts', async () => {
      const { client, socket } = await connectClient();
      const controller = new AbortController();
      const iterator = client.views.Token.list.watch({ signal: controller.signal })[Symbol.asyncIterator]();

      socket.receive({ mode: 'list', entity: 'Token/list', op: 'upsert', key: 'a', data: token('a', {}) });
      expect(await iterator.next()).toEqual({
        value: { type: 'upsert', key: 'a', data: token('a', {}) },
        done: false,
      });

      controller.abort();

      expect(await iterator.next()).toEqual({ value: undefined, done: true });
      expect(socket.messages().at(-1)).toEqual({ type: 'unsubscribe', view: 'Token/list' });
      client.disconnect();
    });

    it('fails live sequences on a subscription error for the view', async () => {
      const { client, socket } = await connectClient();
      const iterator = client.views.Token.list.use()[Symbol.asyncIterator]();

      const pending = iterator.next();
      socket.receive({ op: 'error', view: 'Token/list', message: 'view not found' });

      await expect(pending).rejects.toBeInstanceOf(SubscriptionError);
      client.disconnect();
    });
  });

  it('re-subscribes after a reconnect and converges the cache', async () => {
    const { client, fake, socket } = await connectClient();
    const states: ConnectionState[] = [];
    client.onConnectionStateChange((state) => states.push(state));
    const iterator = client.views.Token.list.watch()[Symbol.asyncIterator]();

    socket.receive({
      mode: 'list',
      entity: 'Token/list',
      op: 'snapshot',
      data: [
        { key: 'a', data: { n: 1 } },
        { key: 'b', data: { n: 2 } },
      ],
    });

    socket.drop(1006);
    vi.advanceTimersByTime(1000);
    const resumed = fake.latest();
    resumed.open();

    expect(resumed.messages()).toEqual([{ type: 'subscribe', view: 'Token/list' }]);
    resumed.receive({
      mode: 'list',
      entity: 'Token/list',
      op: 'snapshot',
      data: [{ key: 'a', data: { n: 3 } }],
    });

    expect(states).toEqual(['reconnecting', 'connected']);
    expect(client.store.entries('Token/list')).toEqual([['a', { n: 3 }]]);

    const updates: unknown[] = [];
    for (let i = 0; i < 4; i++) {
      updates.push((await iterator.next()).value);
    }
    expect(updates).toEqual([
      { type: 'upsert', key: 'a', data: { n: 1 } },
      { type: 'upsert', key: 'b', data: { n: 2 } },
      { type: 'upsert', key: 'a', data: { n: 3 } },
      { type: 'delete', key: 'b' },
    ]);
    await iterator.return?.();
    client.disconnect();
  });

  it('ends live sequences on disconnect without touching later subscriptions', async () => {
    const { client, fake } = await connectClient();
    const first = client.views.Token.list.watch()[Symbol.asyncIterator]();
    const pending = first.next();

    client.disconnect();
    await expect(pending).resolves.toEqual({ value: undefined, done: true });

    const reconnecting = client.connect();
    const resumed = fake.latest();
    resumed.open();
    await reconnecting;

    const second = client.views.Token.list.watch()[Symbol.asyncIterator]();
    await first.return?.();

    expect(resumed.messages()).toEqual([{ type: 'subscribe', view: 'Token/list' }]);
    resumed.receive({ mode: 'list', entity: 'Token/list', op: 'upsert', key: 'a', data: { n: 1 } });
    expect(await second.next()).toEqual({ value: { type: 'upsert', key: 'a', data: { n: 1 } }, done: false });

    await second.return?.();
    expect(resumed.messages().at(-1)).toEqual({ type: 'unsubscribe', view: 'Token/list' });
    client.disconnect();
  });

  it('counts dropped frames', async () => {
    const { client, socket } = await connectClient();
    socket.receive('not a frame');
    socket.receive({ op: 'unknown' });

    expect(client.stats.droppedFrames).toBe(2);
    expect(client.isConnected()).toBe(true);
    client.disconnect();
  });

  it('drops entities failing the stack schema when validateFrames is on', async () => {
    const fake = createFakeTransport();
    const validated = { ...stack, schemas: { Token: z.object({ id: z.object({ mint: z.string() }) }) } };
    const connecting = LiveViewClient.connect(validated, {
      transport: fake.factory,
      validateFrames: true,
      logger: silentLogger(),
    });
    fake.latest().open();
    const client = await connecting;

    fake.latest().receive({ mode: 'list', entity: 'Token/list', op: 'upsert', key: 'bad', data: { id: {} } });
    fake.latest().receive({ mode: 'list', entity: 'Token/list', op: 'upsert', key: 'good', data: token('good', {}) });

    expect(client.store.keys('Token/list')).toEqual(['good']);
    expect(client.stats.droppedFrames).toBe(1);
    client.disconnect();
  });

  it('throws LiveViewError subclasses', () => {
    expect(new ConnectionError('x')).toBeInstanceOf(LiveViewError);
    expect(new SubscriptionError('x', 'Token/list').code).toBe('SUBSCRIPTION_ERROR');
  });
});
