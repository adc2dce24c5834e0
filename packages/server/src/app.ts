import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import type {
  ApiResponse,
  ClipboardSelection,
  EntryInfo,
  EntryProperties,
  OperationEvent,
  SearchEvent,
  Settings,
  WatchEvent,
} from '@filework/shared';
import { toPasteRequest } from './clipboard.js';
import { FileEngine } from './engine.js';
import { createFolder, getProperties, listEntries, renameEntry } from './entries.js';
import { InvalidRequestError, errorCode, errorMessage } from './errors.js';
import type { OperationHandle } from './operations.js';
import type { SearchHandle } from './search.js';
import { loadSettings, resolveStartPath, saveSettings } from './settings.js';

export interface AppOptions {
  logger?: boolean;
  settings?: Settings;
  engine?: FileEngine;
}

function failure<T>(error: unknown, fallbackCode: string): ApiResponse<T> {
  return {
    success: false,
    error: {
      message: errorMessage(error),
      code: errorCode(error) ?? fallbackCode,
    },
  };
}

function openEventStream(reply: FastifyReply): (event: unknown) => void {
  reply.hijack();
  reply.raw.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
  });
  return (event) => {
    if (!reply.raw.writableEnded) {
      reply.raw.write(`data: ${JSON.stringify(event)}\n\n`);
    }
  };
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const settings = options.settings ?? loadSettings();
  const engine =
    options.engine ??
    new FileEngine({
      debounceMs: settings.watch.debounceMs,
      caseSensitiveSearch: settings.search.caseSensitive,
    });

  const operations = new Map<string, OperationHandle>();
  const searches = new Map<string, SearchHandle>();

  const fastify = Fastify({
    logger: options.logger ?? true,
  });

  await fastify.register(cors, {
    origin: true,
  });

  fastify.get('/api/health', async () => ({
    status: 'ok',
    activeOperations: operations.size,
    activeSearches: searches.size,
  }));

  fastify.get('/api/settings', async (): Promise<ApiResponse<Settings>> => {
    try {
      return { success: true, data: loadSettings() };
    } catch (error) {
      return failure(error, 'SETTINGS_ERROR');
    }
  });

  fastify.put<{ Body: unknown }>(
    '/api/settings',
    async (request, reply): Promise<ApiResponse<Settings>> => {
      try {
        return { success: true, data: saveSettings(request.body) };
      } catch (error) {
        reply.code(400);
        return failure(error, 'SETTINGS_SAVE_ERROR');
      }
    }
  );

  async function streamOperation(handle: OperationHandle, reply: FastifyReply): Promise<void> {
    const send = openEventStream(reply);
    operations.set(handle.id, handle);

    send({ type: 'start', id: handle.id, kind: handle.kind, totalCount: handle.totalCount } satisfies OperationEvent);
    handle.onProgress((progress) => {
      send({ type: 'progress', id: handle.id, progress } satisfies OperationEvent);
    });

    try {
      const result = await handle.result;
      send({ type: 'complete', id: handle.id, result } satisfies OperationEvent);
    } finally {
      operations.delete(handle.id);
      reply.raw.end();
    }
  }

  // Run a batch (SSE stream of OperationEvent)
  fastify.post<{ Body: unknown }>('/api/operations', async (request, reply) => {
    let handle: OperationHandle;
    try {
      handle = engine.submit(request.body);
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        return reply.code(400).send(failure(error, 'INVALID_REQUEST'));
      }
      throw error;
    }
    await streamOperation(handle, reply);
  });

  fastify.post<{ Body: { selection: ClipboardSelection; destinationDir: string } }>(
    '/api/paste',
    async (request, reply) => {
      let handle: OperationHandle;
      try {
        const { selection, destinationDir } = request.body;
        handle = engine.submit(toPasteRequest(selection, destinationDir));
      } catch (error) {
        return reply.code(400).send(failure(error, 'INVALID_REQUEST'));
      }
      await streamOperation(handle, reply);
    }
  );

  fastify.delete<{ Params: { id: string } }>(
    '/api/operations/:id',
    async (request, reply): Promise<ApiResponse<{ id: string }>> => {
      const handle = operations.get(request.params.id);
      if (!handle) {
        reply.code(404);
        return { success: false, error: { message: 'Operation not found', code: 'NOT_FOUND' } };
      }
      handle.cancel();
      return { success: true, data: { id: handle.id } };
    }
  );

  // Recursive search (SSE stream of SearchEvent)
  fastify.get<{ Querystring: { root?: string; pattern?: string } }>(
    '/api/search',
    async (request, reply) => {
      let handle: SearchHandle;
      try {
        handle = engine.submitSearch(request.query.root ?? '', request.query.pattern ?? '');
      } catch (error) {
        return reply.code(400).send(failure(error, 'INVALID_REQUEST'));
      }

      const send = openEventStream(reply);
      searches.set(handle.id, handle);
      // a client that goes away abandons the scan
      reply.raw.on('close', () => handle.stop());

      send({
        type: 'start',
        id: handle.id,
        rootPath: handle.request.rootPath,
        pattern: handle.request.pattern,
      } satisfies SearchEvent);
      handle.onMatch((path) => {
        send({ type: 'match', id: handle.id, path } satisfies SearchEvent);
      });

      try {
        const summary = await handle.done;
        send({ type: 'complete', id: handle.id, summary } satisfies SearchEvent);
      } finally {
        searches.delete(handle.id);
        reply.raw.end();
      }
    }
  );

  fastify.delete<{ Params: { id: string } }>(
    '/api/search/:id',
    async (request, reply): Promise<ApiResponse<{ id: string }>> => {
      const handle = searches.get(request.params.id);
      if (!handle) {
        reply.code(404);
        return { success: false, error: { message: 'Search not found', code: 'NOT_FOUND' } };
      }
      handle.stop();
      return { success: true, data: { id: handle.id } };
    }
  );

  // Change notifications (SSE stream of WatchEvent until error or disconnect)
  fastify.get<{ Querystring: { path?: string } }>('/api/watch', async (request, reply) => {
    const subscription = engine.watchDirectory(request.query.path || resolveStartPath(settings));
    const send = openEventStream(reply);

    await new Promise<void>((resolveStream) => {
      subscription.onChanged((notification) => {
        send({ type: 'changed', notification } satisfies WatchEvent);
      });
      subscription.onError((error) => {
        send({ type: 'error', error: error.message } satisfies WatchEvent);
        resolveStream();
      });
      reply.raw.on('close', () => resolveStream());
    });

    await subscription.stop();
    reply.raw.end();
  });

  fastify.get<{ Querystring: { path?: string } }>(
    '/api/entries',
    async (request, reply): Promise<ApiResponse<EntryInfo[]>> => {
      try {
        return { success: true, data: await listEntries(request.query.path || resolveStartPath(settings)) };
      } catch (error) {
        reply.code(400);
        return failure(error, 'LIST_ERROR');
      }
    }
  );

  fastify.get<{ Querystring: { path?: string } }>(
    '/api/properties',
    async (request, reply): Promise<ApiResponse<EntryProperties>> => {
      try {
        if (!request.query.path) {
          throw new InvalidRequestError('Path required');
        }
        return { success: true, data: await getProperties(request.query.path) };
      } catch (error) {
        reply.code(400);
        return failure(error, 'PROPERTIES_ERROR');
      }
    }
  );

  fastify.post<{ Body: { path: string; newName: string } }>(
    '/api/rename',
    async (request, reply): Promise<ApiResponse<{ path: string }>> => {
      try {
        const path = await renameEntry(request.body.path, request.body.newName);
        return { success: true, data: { path } };
      } catch (error) {
        reply.code(400);
        return failure(error, 'RENAME_ERROR');
      }
    }
  );

  fastify.post<{ Body: { parent: string; name: string } }>(
    '/api/folder',
    async (request, reply): Promise<ApiResponse<{ path: string }>> => {
      try {
        const path = await createFolder(request.body.parent, request.body.name);
        return { success: true, data: { path } };
      } catch (error) {
        reply.code(400);
        return failure(error, 'FOLDER_ERROR');
      }
    }
  );

  return fastify;
}
