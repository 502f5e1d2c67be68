import Fastify, { type FastifyInstance } from 'fastify';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { ZodError } from 'zod';
import {
  assertDistinctCards,
  CardsError,
  compareHands,
  PokerHand,
  showdown,
  type CardsErrorCode,
  type DeckOptions,
} from '@cardroom/cards';
import { createConnectionHandler } from './connection.js';
import type { Env } from './env.js';
import {
  CompareRequestSchema,
  EvaluateRequestSchema,
  ShowdownRequestSchema,
  toHandView,
  type ErrorMessage,
} from './protocol.js';
import { send, TableRegistry } from './tables.js';

export interface AppOptions {
  env: Pick<Env, 'LOG_LEVEL' | 'TABLE_JWT_SECRET'>;
  deck?: DeckOptions;
}

// Everything else a CardsError can carry is a bad request
const CONFLICT_CODES: ReadonlySet<CardsErrorCode> = new Set(['EMPTY_DECK', 'CARD_NOT_REMOVED']);

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString();
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString();
  }
  return data.toString();
}

export function buildApp({ env, deck }: AppOptions): FastifyInstance {
  const app = Fastify({
    logger: { level: env.LOG_LEVEL },
  });
  const handLogger = app.log.child({ module: 'evaluator' });
  const tables = new TableRegistry(deck);

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      const message = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return reply.status(400).send({ code: 'INVALID_REQUEST', message });
    }
    if (error instanceof CardsError) {
      const status = CONFLICT_CODES.has(error.code) ? 409 : 400;
      return reply.status(status).send({ code: error.code, message: error.message });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ code: error.code, message: error.message });
    }
    request.log.error(error);
    return reply.status(500).send({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
  });

  // HTTP: Health check endpoint
  app.get('/health', async () => {
    return { ok: true };
  });

  app.post('/hands/evaluate', async (request) => {
    const { cards } = EvaluateRequestSchema.parse(request.body);
    assertDistinctCards(cards);
    return toHandView(new PokerHand(cards, { logger: handLogger }));
  });

  app.post('/hands/compare', async (request) => {
    const { a, b } = CompareRequestSchema.parse(request.body);
    // The two hands may share board cards, so each is checked on its own.
    assertDistinctCards(a);
    assertDistinctCards(b);
    const result = compareHands(
      new PokerHand(a, { logger: handLogger }),
      new PokerHand(b, { logger: handLogger })
    );
    return { result };
  });

  app.post('/showdown', async (request) => {
    const { board, seats } = ShowdownRequestSchema.parse(request.body);
    const { ranked, winners } = showdown(seats, board, { logger: handLogger });
    request.log.info(`Showdown: seats=${seats.length}, winners=${winners.join(',')}`);
    return {
      ranked: ranked.map(({ id, hand }) => ({ id, ...toHandView(hand) })),
      winners,
    };
  });

  // WebSocket server
  const wss = new WebSocketServer({ noServer: true });
  const connections = createConnectionHandler({
    tables,
    jwtSecret: env.TABLE_JWT_SECRET,
    log: app.log,
  });

  wss.on('connection', (ws: WebSocket) => {
    ws.on('message', (data: RawData) => {
      connections.handleMessage(ws, rawDataToString(data)).catch((err: unknown) => {
        app.log.error({ err }, 'WebSocket message handling failed');
        const message: ErrorMessage = {
          type: 'ERROR',
          code: 'INTERNAL_ERROR',
          message: 'Internal server error',
        };
        send(ws, message);
      });
    });

    ws.on('close', () => {
      connections.handleClose(ws);
    });
  });

  // Upgrade HTTP to WebSocket
  app.server.on('upgrade', (request, socket, head) => {
    const pathname = new URL(request.url || '/', `http://${request.headers.host}`).pathname;

    if (pathname === '/ws') {
      wss.handleUpgrade(request, socket, head, (ws) => {
        wss.emit('connection', ws, request);
      });
    } else {
      socket.destroy();
    }
  });

  app.addHook('onClose', async () => {
    for (const client of wss.clients) {
      client.terminate();
    }
    wss.close();
  });

  return app;
}
