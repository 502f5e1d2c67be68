import type { FastifyBaseLogger } from 'fastify';
import { CardsError, EmptyDeckError, type Card } from '@cardroom/cards';
import { WebSocket } from 'ws';
import { verifyTableToken, type TableGrant } from './jwt.js';
import {
  ClientMessageSchema,
  toCodes,
  type ActionErrorMessage,
  type ErrorMessage,
  type HelloMessage,
  type TableMessage,
} from './protocol.js';
import { send, type TableRegistry, type TableSocket } from './tables.js';

export interface ConnectionDeps {
  tables: TableRegistry;
  jwtSecret: string;
  log: Pick<FastifyBaseLogger, 'info' | 'warn'>;
}

interface Session {
  tableId: string;
  playerId: string;
}

export interface ConnectionHandler {
  handleMessage(ws: TableSocket, data: string): Promise<void>;
  handleClose(ws: TableSocket): void;
}

function actionError(code: string, message: string): ActionErrorMessage {
  return { type: 'ACTION_ERROR', code, message };
}

function error(code: string, message: string): ErrorMessage {
  return { type: 'ERROR', code, message };
}

/**
 * WebSocket message handling for dealer tables. A socket must say HELLO with
 * a valid access token before it may touch a table's deck.
 */
export function createConnectionHandler({ tables, jwtSecret, log }: ConnectionDeps): ConnectionHandler {
  const authenticated = new WeakMap<TableSocket, Session>();
  const authenticating = new WeakSet<TableSocket>();

  async function handleHello(ws: TableSocket, message: HelloMessage): Promise<void> {
    // One HELLO per socket; later ones are ignored, including while one is being verified.
    if (authenticated.has(ws) || authenticating.has(ws)) {
      return;
    }

    let grant: TableGrant | null = null;
    authenticating.add(ws);
    try {
      grant = await verifyTableToken(message.accessToken, jwtSecret, message.tableId);
    } catch (err) {
      log.warn({ err, tableId: message.tableId }, 'HELLO rejected');
    } finally {
      authenticating.delete(ws);
    }
    if (!grant) {
      send(ws, error('AUTH_INVALID', 'Invalid access token'));
      ws.close();
      return;
    }
    const { playerId } = grant;

    // The socket may have closed while the token was checked.
    if (ws.readyState !== WebSocket.OPEN) {
      log.info(`HELLO dropped, socket closed: tableId=${message.tableId}, playerId=${playerId}`);
      return;
    }

    authenticated.set(ws, { tableId: message.tableId, playerId });
    const { isReconnect } = tables.addClient(message.tableId, ws, playerId);
    if (isReconnect) {
      log.info(`Reconnection: tableId=${message.tableId}, playerId=${playerId}`);
    }

    send(ws, { type: 'WELCOME', tableId: message.tableId, playerId });
    const count = tables.broadcastDeckState(message.tableId);
    log.info(`DECK_STATE broadcast: tableId=${message.tableId}, count=${count}`);
  }

  function handleTableAction(ws: TableSocket, session: Session, message: TableMessage): void {
    const table = tables.getTable(message.tableId);
    if (!table) {
      send(ws, actionError('TABLE_NOT_FOUND', 'Table not found'));
      return;
    }
    const { deck } = table;

    switch (message.type) {
      case 'SYNC_REQUEST':
        send(ws, tables.deckState(table));
        return;
      case 'SHUFFLE':
        deck.shuffle();
        break;
      case 'DEAL': {
        if (message.count > deck.active.length) {
          throw new EmptyDeckError();
        }
        const cards: Card[] = [];
        for (let i = 0; i < message.count; i++) {
          cards.push(deck.deal());
        }
        send(ws, { type: 'DEALT', tableId: table.id, cards: toCodes(cards) });
        break;
      }
      case 'BURN':
        deck.burn();
        break;
      case 'RETURN_CARDS':
        deck.returnCards(message.cards, message.position);
        break;
      case 'RETURN_POPPED':
        deck.returnPopped(message.position);
        break;
      case 'RETURN_DISCARDED':
        deck.returnDiscarded(message.position);
        break;
      case 'RETURN_ALL':
        deck.returnAll();
        break;
      case 'RESET':
        tables.resetDeck(table);
        break;
    }

    log.info(`${message.type}: tableId=${table.id}, playerId=${session.playerId}`);
    tables.broadcastDeckState(table.id);
  }

  async function handleMessage(ws: TableSocket, data: string): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      send(ws, error('INVALID_MESSAGE', 'Message is not valid JSON'));
      return;
    }

    const parseResult = ClientMessageSchema.safeParse(raw);
    if (!parseResult.success) {
      const problems = parseResult.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      log.warn({ issues: parseResult.error.issues }, 'Invalid WebSocket message received');
      send(ws, error('INVALID_MESSAGE', `Invalid message format: ${problems}`));
      return;
    }

    const message = parseResult.data;
    if (message.type === 'PING') {
      send(ws, { type: 'PONG' });
      return;
    }
    if (message.type === 'HELLO') {
      await handleHello(ws, message);
      return;
    }

    const session = authenticated.get(ws);
    if (!session) {
      send(ws, actionError('NOT_AUTHENTICATED', 'Must send HELLO first'));
      return;
    }
    if (message.tableId !== session.tableId) {
      send(ws, actionError('INVALID_TABLE', 'Table ID does not match authenticated table'));
      return;
    }

    try {
      handleTableAction(ws, session, message);
    } catch (err) {
      if (err instanceof CardsError) {
        log.warn(`${message.type} failed: tableId=${session.tableId}, code=${err.code}`);
        send(ws, actionError(err.code, err.message));
        // Cards moved before a failure stay moved; let everyone see it
        tables.broadcastDeckState(session.tableId);
        return;
      }
      throw err;
    }
  }

  function handleClose(ws: TableSocket): void {
    const session = authenticated.get(ws);
    if (!session) {
      return;
    }
    authenticated.delete(ws);
    const dropped = tables.removeClient(session.tableId, ws, session.playerId);
    if (dropped) {
      log.info(`Table closed: tableId=${session.tableId}`);
    } else {
      tables.broadcastDeckState(session.tableId);
    }
    log.info(`Player disconnected: tableId=${session.tableId}, playerId=${session.playerId}`);
  }

  return { handleMessage, handleClose };
}
