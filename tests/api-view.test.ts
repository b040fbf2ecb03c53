import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Hono, type Context } from 'hono';
import {
  ApiException,
  ConfigurationException,
  Deserializer,
  IsAuthenticated,
  apiView,
  apiViewSet,
  configureViews,
  definePermission,
  inputs,
  resetLogger,
  resetViewSettings,
  setContextVar,
  setLogger,
  type ApiViewOptions,
  type Logger,
  type ViewArgs,
} from '../src/index.js';

class NoteDeserializer extends Deserializer {
  static override fields = {
    title: new inputs.CharField({ maxLength: 20 }),
    priority: new inputs.IntegerField({ required: false, minValue: 1 }),
    tag: new inputs.ListField(new inputs.CharField(), { required: false }),
  };
}

const echo = (c: Context, args: ViewArgs) => c.json(args);

function sendJson(app: Hono, path: string, body: unknown, method = 'POST') {
  return app.request(path, {
    method,
    body: JSON.stringify(body),
    headers: { 'Content-Type': 'application/json' },
  });
}

function sendForm(app: Hono, path: string, body: string) {
  return app.request(path, {
    method: 'POST',
    body,
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
  });
}

function createTestLogger() {
  return {
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

let logger: ReturnType<typeof createTestLogger>;

beforeEach(() => {
  logger = createTestLogger();
  setLogger(logger);
});

afterEach(() => {
  resetLogger();
  resetViewSettings();
});

// ============================================================================
// Request extraction
// ============================================================================

describe('apiView request extraction', () => {
  it('should pass URL and query parameters to the handler', async () => {
    const app = new Hono();
    app.get('/notes/:id', apiView()(echo));

    const res = await app.request('/notes/7?tag=a&tag=b&page=2');

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      urlParams: { id: '7' },
      queryParams: { tag: ['a', 'b'], page: '2' },
      deserializedData: null,
    });
  });

  it('should deserialize a JSON payload', async () => {
    const app = new Hono();
    app.post('/notes', apiView({ deserializer: NoteDeserializer })(echo));

    const res = await sendJson(app, '/notes', { title: ' Hello ', priority: '2' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      urlParams: {},
      queryParams: {},
      deserializedData: { title: 'Hello', priority: 2 },
    });
  });

  it('should hand an empty body to the deserializer as null', async () => {
    const app = new Hono();
    app.post('/notes', apiView({ deserializer: NoteDeserializer })(echo));

    const res = await app.request('/notes', { method: 'POST' });

    expect(res.status).toBe(200);
    expect((await res.json()).deserializedData).toBeNull();
  });

  it('should answer 400 with the error tree for invalid payloads', async () => {
    const app = new Hono();
    app.post('/notes', apiView({ deserializer: NoteDeserializer })(echo));

    const res = await sendJson(app, '/notes', { title: 'x'.repeat(21), priority: 0 });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: {
        code: 'BAD_REQUEST',
        message: 'Bad request.',
        details: { title: ['Ensure this value has at most 20 characters (it has 21).'] },
      },
    });
  });

  it('should answer 400 for malformed JSON', async () => {
    const handler = vi.fn(echo);
    const app = new Hono();
    app.post('/notes', apiView()(handler));

    const res = await app.request('/notes', { method: 'POST', body: '{"title":' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'BAD_REQUEST', message: 'Malformed JSON payload.' },
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('should pass any mapping through without a deserializer', async () => {
    const app = new Hono();
    app.put('/notes/:id', apiView()(echo));

    const res = await sendJson(app, '/notes/3', { anything: [1, 2] }, 'PUT');

    expect((await res.json()).deserializedData).toEqual({ anything: [1, 2] });
  });

  it('should use per-method deserializers', async () => {
    const app = new Hono();
    app.on(['POST', 'PUT'], '/notes', apiView({ deserializer: { post: NoteDeserializer } })(echo));

    const created = await sendJson(app, '/notes', { priority: 4 });
    const replaced = await sendJson(app, '/notes', { priority: 4 }, 'PUT');
    const listed = await sendJson(app, '/notes', [1], 'PUT');

    expect(created.status).toBe(400);
    expect((await created.json()).error.details).toEqual({ title: ['This field is required.'] });
    expect((await replaced.json()).deserializedData).toEqual({ priority: 4 });
    expect(listed.status).toBe(400);
    expect((await listed.json()).error.details).toEqual({ __all__: ['This field should be an object.'] });
  });
});

// ============================================================================
// Form payloads
// ============================================================================

describe('apiView form payloads', () => {
  it('should reject forms with 403 by default', async () => {
    const app = new Hono();
    app.post('/notes', apiView()(echo));

    const res = await sendForm(app, '/notes', 'title=Hi');

    expect(res.status).toBe(403);
    expect((await res.json()).error.code).toBe('FORBIDDEN');
  });

  it('should reject forms with 415 when configured', async () => {
    const app = new Hono();
    app.post('/notes', apiView({ formRejection: 'unsupported-media-type' })(echo));

    const res = await sendForm(app, '/notes', 'title=Hi');

    expect(res.status).toBe(415);
    expect(await res.json()).toEqual({
      success: false,
      error: {
        code: 'UNSUPPORTED_MEDIA_TYPE',
        message: "Unsupported media type. Check your request's Content-Type.",
      },
    });
  });

  it('should parse forms when allowed, keeping repeated keys as lists', async () => {
    const app = new Hono();
    app.post('/notes', apiView({ allowForms: true, deserializer: NoteDeserializer })(echo));

    const res = await sendForm(app, '/notes', 'title=Hi&priority=3&tag=a&tag=b');

    expect(res.status).toBe(200);
    expect((await res.json()).deserializedData).toEqual({ title: 'Hi', priority: 3, tag: ['a', 'b'] });
  });

  it('should take form handling from the view settings', async () => {
    const before = apiView()(echo);
    configureViews({ allowForms: true });
    const after = apiView()(echo);
    const app = new Hono();
    app.post('/before', before);
    app.post('/after', after);

    const rejected = await sendForm(app, '/before', 'title=Hi');
    const accepted = await sendForm(app, '/after', 'title=Hi');

    expect(rejected.status).toBe(403);
    expect((await accepted.json()).deserializedData).toEqual({ title: 'Hi' });
  });
});

// ============================================================================
// Methods and permissions
// ============================================================================

describe('apiView methods and permissions', () => {
  it('should answer 405 for methods outside allowedMethods', async () => {
    const app = new Hono();
    app.on(['GET', 'DELETE'], '/notes', apiView({ allowedMethods: ['get'] })(echo));

    const allowed = await app.request('/notes');
    const denied = await app.request('/notes', { method: 'DELETE' });

    expect(allowed.status).toBe(200);
    expect(denied.status).toBe(405);
    expect(await denied.json()).toEqual({
      success: false,
      error: { code: 'METHOD_NOT_ALLOWED', message: 'HTTP method not allowed.' },
    });
  });

  it('should answer 403 when the permission denies access', async () => {
    const app = new Hono();
    app.post('/notes', apiView({ permission: IsAuthenticated })(echo));

    const res = await app.request('/notes', { method: 'POST', body: '{"broken":' });

    expect(res.status).toBe(403);
    expect((await res.json()).error).toEqual({
      code: 'FORBIDDEN',
      message: 'Forbidden operation. Make sure you have the right permissions.',
    });
  });

  it('should grant access to authenticated users', async () => {
    const app = new Hono();
    app.use('*', async (c, next) => {
      setContextVar(c, 'user', { id: 'user-1' });
      await next();
    });
    app.get('/notes', apiView({ permission: IsAuthenticated })(echo));

    const res = await app.request('/notes');

    expect(res.status).toBe(200);
  });

  it('should treat a null user as anonymous', async () => {
    const app = new Hono();
    app.use('*', async (c, next) => {
      setContextVar(c, 'user', null);
      await next();
    });
    app.get('/notes', apiView({ permission: IsAuthenticated })(echo));

    const res = await app.request('/notes');

    expect(res.status).toBe(403);
    expect((await res.json()).error.code).toBe('FORBIDDEN');
  });

  it('should give permissions the method and handler name', async () => {
    const seen: Array<{ method: string; handler: string }> = [];
    const Recorder = definePermission('Recorder', ({ method, handler }) => {
      seen.push({ method, handler });
      return true;
    });
    const app = new Hono();
    app.get('/named', apiView({ permission: Recorder })(async function listNotes(c: Context) {
      return c.json([]);
    }));
    app.delete('/custom', apiView({ permission: Recorder, name: 'notes.purge' })(echo));

    await app.request('/named');
    await app.request('/custom', { method: 'DELETE' });

    expect(seen).toEqual([
      { method: 'GET', handler: 'listNotes' },
      { method: 'DELETE', handler: 'notes.purge' },
    ]);
  });
});

// ============================================================================
// Error handling
// ============================================================================

describe('apiView error handling', () => {
  it('should render unexpected errors as 500 and log them', async () => {
    const app = new Hono();
    app.get('/boom', apiView()(() => {
      throw new Error('boom');
    }));

    const res = await app.request('/boom');

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'INTERNAL_ERROR', message: 'An unknown server error occurred.' },
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0]?.[0]).toBe('Unmapped error');
  });

  it('should pass API exceptions through', async () => {
    const app = new Hono();
    app.get('/missing', apiView()(() => {
      throw new ApiException('Note is archived', 410, 'GONE');
    }));

    const res = await app.request('/missing');

    expect(res.status).toBe(410);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'GONE', message: 'Note is archived' },
    });
  });

  it('should use the configured error mappers', async () => {
    const app = new Hono();
    const view = apiView({
      errorHandler: {
        mappers: [
          (error) => (error instanceof RangeError ? new ApiException(error.message, 409, 'CONFLICT') : undefined),
        ],
      },
    });
    app.post('/notes', view(() => {
      throw new RangeError('Title already taken');
    }));

    const res = await app.request('/notes', { method: 'POST' });

    expect(res.status).toBe(409);
    expect((await res.json()).error).toEqual({ code: 'CONFLICT', message: 'Title already taken' });
  });

  it('should reject invalid options when decorating', () => {
    expect(() => apiView({ allowedMethods: [] })).toThrow(ConfigurationException);
    expect(() => apiView({ allowedMethods: ['FETCH'] })).toThrow('Invalid view options');
    expect(() => apiView({ deserializer: { GET: NoteDeserializer } })).toThrow(
      '`deserializer` map keys must be one of POST, PUT, PATCH. Given: GET'
    );
  });
});

// ============================================================================
// View sets
// ============================================================================

describe('apiViewSet', () => {
  class NoteViews {
    readonly notes = new Map<string, string>([['1', 'first']]);

    async get(c: Context, { urlParams }: ViewArgs) {
      return c.json({ note: this.notes.get(urlParams.id) ?? null });
    }

    async post(c: Context, { deserializedData }: ViewArgs) {
      return c.json({ created: deserializedData }, 201);
    }
  }

  function buildApp(options: ApiViewOptions = {}) {
    const views = apiViewSet(options)(new NoteViews());
    const app = new Hono();
    app.on(['GET', 'POST', 'DELETE'], '/notes/:id', views.dispatch);
    return { app, views };
  }

  it('should decorate each method handler', () => {
    const { views } = buildApp();

    expect([...views.handlers.keys()]).toEqual(['GET', 'POST']);
    expect(views.target).toBeInstanceOf(NoteViews);
  });

  it('should dispatch by method with the bundle bound', async () => {
    const { app } = buildApp({ deserializer: NoteDeserializer });

    const read = await app.request('/notes/1');
    const created = await sendJson(app, '/notes/2', { title: 'Second' });

    expect(await read.json()).toEqual({ note: 'first' });
    expect(created.status).toBe(201);
    expect(await created.json()).toEqual({ created: { title: 'Second' } });
  });

  it('should answer 405 for methods the bundle lacks', async () => {
    const { app } = buildApp();

    const res = await app.request('/notes/1', { method: 'DELETE' });

    expect(res.status).toBe(405);
    expect((await res.json()).error.code).toBe('METHOD_NOT_ALLOWED');
  });

  it('should name handlers after the bundle and method', async () => {
    const handlers: string[] = [];
    const Recorder = definePermission('Recorder', ({ handler }) => {
      handlers.push(handler);
      return true;
    });
    const { app } = buildApp({ permission: Recorder });

    await app.request('/notes/1');
    await sendJson(app, '/notes/1', { any: 'thing' });

    expect(handlers).toEqual(['NoteViews.get', 'NoteViews.post']);
  });
});
