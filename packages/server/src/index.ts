import {
  BpeTokenizer,
  BpeValidationError,
  MalformedMergeTableError,
  MergeTableParseError,
  ModelNotFoundError,
  UnknownTokenError,
  error,
  fromDocument,
  loadConfig,
  mergeTableDocumentSchema,
  setLogLevel,
  toDocument,
} from '@bytepair/core';
import { fileURLToPath } from 'node:url';
import { serve } from '@hono/node-server';
import { zValidator } from '@hono/zod-validator';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { ModelRegistry, type RegisteredModel } from './registry.js';

// ============================================================================
// @bytepair/server: REST API
// ============================================================================
//
// Train, load, encode and decode over HTTP. Models live in memory, keyed by
// the sha256 of their merge table, so re-registering a table is idempotent.
// ============================================================================

export const app = new Hono();

const registry = new ModelRegistry(loadConfig().maxModels);
const utf8 = new TextDecoder('utf-8', { fatal: false });

function describe(id: string, model: RegisteredModel) {
  return {
    id,
    merges: model.tokenizer.mergeTable.size,
    vocabSize: model.tokenizer.vocabSize,
    createdAt: model.createdAt,
  };
}

/** Map library errors onto status codes; anything else falls through to onError. */
function failure(err: unknown): { status: 400 | 404 | 422; code: string; message: string } {
  if (err instanceof ModelNotFoundError) {
    return { status: 404, code: 'MODEL_NOT_FOUND', message: err.message };
  }
  if (err instanceof UnknownTokenError) {
    return { status: 422, code: 'UNKNOWN_TOKEN', message: err.message };
  }
  if (err instanceof MalformedMergeTableError || err instanceof MergeTableParseError) {
    return { status: 422, code: 'MALFORMED_MERGE_TABLE', message: err.message };
  }
  if (err instanceof BpeValidationError) {
    return { status: 400, code: 'INVALID_REQUEST', message: err.message };
  }
  throw err;
}

// --- Middleware ---
app.use(
  '*',
  cors({
    origin: '*',
    allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
  }),
);

// --- Error handling ---
app.onError((err, c) => {
  error(`${c.req.method} ${c.req.path} failed: ${err.message}`);
  return c.json(
    {
      error: {
        code: 'INTERNAL_ERROR',
        message: err.message,
      },
    },
    500,
  );
});

// --- Schemas ---
const trainSchema = z
  .object({
    text: z.string().max(5_000_000),
    merges: z.number().int().min(0).max(100_000).optional(),
    vocabSize: z.number().int().min(256).max(100_256).optional(),
  })
  .refine((body) => body.merges === undefined || body.vocabSize === undefined, {
    message: 'Pass either merges or vocabSize, not both',
  });

const encodeSchema = z.object({
  model: z.string().min(1).max(128),
  text: z.string().max(5_000_000),
});

const decodeSchema = z.object({
  model: z.string().min(1).max(128),
  ids: z.array(z.number().int().min(0)).max(5_000_000),
});

// --- Routes ---

app.get('/health', (c) =>
  c.json({
    status: 'ok',
    service: 'bytepair-api',
    version: '0.1.0',
    models: registry.size,
  }),
);

app.post('/v1/train', zValidator('json', trainSchema), async (c) => {
  const { text, merges, vocabSize } = c.req.valid('json');
  try {
    const target =
      vocabSize !== undefined ? { vocabSize } : { merges: merges ?? loadConfig().defaultMerges };
    const tokenizer = BpeTokenizer.train(text, target);
    const { id, isNew } = registry.register(tokenizer);

    return c.json({
      id,
      isNew,
      merges: tokenizer.mergeTable.size,
      vocabSize: tokenizer.vocabSize,
      tokens: tokenizer.countTokens(text),
      compressionRatio: tokenizer.compressionRatio(text),
    });
  } catch (err: unknown) {
    const { status, code, message } = failure(err);
    return c.json({ error: { code, message } }, status);
  }
});

app.post('/v1/models', zValidator('json', mergeTableDocumentSchema), async (c) => {
  const document = c.req.valid('json');
  try {
    const { id, isNew } = registry.register(new BpeTokenizer(fromDocument(document)));
    return c.json({ ...describe(id, registry.lookup(id)), isNew }, isNew ? 201 : 200);
  } catch (err: unknown) {
    const { status, code, message } = failure(err);
    return c.json({ error: { code, message } }, status);
  }
});

app.get('/v1/models', (c) =>
  c.json({ models: registry.list().map(([id, model]) => describe(id, model)) }),
);

app.get('/v1/models/:id', (c) => {
  const id = c.req.param('id');
  try {
    const model = registry.lookup(id);
    return c.json({ ...describe(id, model), table: toDocument(model.tokenizer.mergeTable) });
  } catch (err: unknown) {
    const { status, code, message } = failure(err);
    return c.json({ error: { code, message } }, status);
  }
});

app.delete('/v1/models/:id', (c) => {
  const id = c.req.param('id');
  try {
    registry.remove(id);
    return c.json({ id, deleted: true });
  } catch (err: unknown) {
    const { status, code, message } = failure(err);
    return c.json({ error: { code, message } }, status);
  }
});

app.post('/v1/encode', zValidator('json', encodeSchema), async (c) => {
  const { model, text } = c.req.valid('json');
  try {
    const { tokenizer } = registry.lookup(model);
    const ids = tokenizer.encode(text);
    return c.json({ model, ids, count: ids.length });
  } catch (err: unknown) {
    const { status, code, message } = failure(err);
    return c.json({ error: { code, message } }, status);
  }
});

app.post('/v1/decode', zValidator('json', decodeSchema), async (c) => {
  const { model, ids } = c.req.valid('json');
  try {
    const { tokenizer } = registry.lookup(model);
    const bytes = tokenizer.decode(ids);
    return c.json({
      model,
      text: utf8.decode(bytes),
      bytes: Buffer.from(bytes).toString('base64'),
      byteLength: bytes.length,
    });
  } catch (err: unknown) {
    const { status, code, message } = failure(err);
    return c.json({ error: { code, message } }, status);
  }
});

// --- Start ---
export function startServer(port?: number) {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  port ??= config.port;
  console.log(`[bytepair-api] Server starting on port ${port}`);
  serve({
    fetch: app.fetch,
    port,
  });

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Graceful shutdown
function shutdown() {
  console.log('[bytepair-api] Shutting down...');
  registry.clear();
  process.exit(0);
}

const isDirectExecution = process.argv[1]
  ? fileURLToPath(import.meta.url) === process.argv[1]
  : false;

if (isDirectExecution) {
  startServer();
}
