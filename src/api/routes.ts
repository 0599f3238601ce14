import { FastifyInstance } from 'fastify';

import { isRepositoryError, RepositoryError, RepositoryErrorKind } from '../core/errors.js';
import { RepositorySwitchboard } from '../services/repository-switchboard.js';
import { AppConfig, Note, RemoteAccount } from '../types/index.js';
import logger from '../utils/logger.js';

interface NoteBody {
  title: string;
  content?: string;
}

const noteBodySchema = {
  type: 'object',
  required: ['title'],
  properties: {
    title: { type: 'string' },
    content: { type: 'string' },
  },
} as const;

export function statusForKind(kind: RepositoryErrorKind): number {
  switch (kind) {
    case 'NotFound':
      return 404;
    case 'InvalidData':
      return 400;
    case 'ContextUnavailable':
      return 503;
    default:
      return 502;
  }
}

export async function registerRoutes(
  app: FastifyInstance,
  switchboard: RepositorySwitchboard,
  config: AppConfig
) {
  const account: RemoteAccount = {
    username: config.couchdb.username,
    password: config.couchdb.password,
  };

  async function requireNote(id: string): Promise<Note> {
    const note = await switchboard.service.getNote(id);
    if (!note) {
      throw RepositoryError.notFound(id);
    }
    return note;
  }

  app.setErrorHandler((error, request, reply) => {
    if (isRepositoryError(error)) {
      return reply.code(statusForKind(error.kind)).send({ error: error.kind, message: error.message });
    }
    if (error.validation) {
      return reply.code(400).send({ error: 'InvalidData', message: error.message });
    }

    logger.error({ error, method: request.method, url: request.url }, 'Request failed');
    return reply.code(error.statusCode ?? 500).send({ error: 'InternalError', message: error.message });
  });

  // Health check
  app.get('/health', async () => {
    return { status: 'ok', store: switchboard.activeKind, timestamp: new Date().toISOString() };
  });

  app.get('/notes', async () => {
    return switchboard.service.getAllNotes();
  });

  // Blank or missing query lists every note
  app.get<{ Querystring: { q?: string } }>('/notes/search', async (request) => {
    return switchboard.service.searchNotes(request.query.q ?? '');
  });

  app.get('/notes/stats', async () => {
    return switchboard.service.getNoteStatistics();
  });

  app.get<{ Params: { id: string } }>('/notes/:id', async (request) => {
    return requireNote(request.params.id);
  });

  app.post<{ Body: NoteBody }>('/notes', { schema: { body: noteBodySchema } }, async (request, reply) => {
    const { title, content } = request.body;
    const note = await switchboard.service.createNote(title, content ?? '');
    reply.code(201);
    return note;
  });

  app.put<{ Params: { id: string }; Body: NoteBody }>(
    '/notes/:id',
    { schema: { body: noteBodySchema } },
    async (request) => {
      const note = await requireNote(request.params.id);
      const { title, content } = request.body;
      return switchboard.service.updateNote(note, title, content ?? '');
    }
  );

  app.delete<{ Params: { id: string } }>('/notes/:id', async (request, reply) => {
    const note = await requireNote(request.params.id);
    await switchboard.service.deleteNote(note);
    return reply.code(204).send();
  });

  app.get('/store', async () => {
    return { active: switchboard.activeKind };
  });

  app.get('/store/remote/status', async () => {
    const status = await switchboard.checkRemoteStatus(account);
    return { status };
  });

  app.post('/store/remote', async () => {
    await switchboard.switchToRemote(account);
    return { active: switchboard.activeKind };
  });

  app.post('/store/local', async () => {
    await switchboard.switchToLocal();
    return { active: switchboard.activeKind };
  });
}
