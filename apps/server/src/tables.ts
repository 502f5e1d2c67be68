import { WebSocket } from 'ws';
import { Deck, type DeckOptions } from '@cardroom/cards';
import { toCodes, type DeckStateMessage, type ServerMessage } from './protocol.js';

/** The part of a ws socket the tables need. */
export interface TableSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface Table {
  id: string;
  deck: Deck;
  clients: Set<TableSocket>;
  // Connection tracking for reconnection
  connectionsByPlayerId: Map<string, TableSocket>; // Active connection per player
  playerIdBySocket: WeakMap<TableSocket, string>; // Reverse lookup
  createdAt: number;
}

export function send(ws: TableSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

/**
 * Dealer tables by id. Each table shares one deck between its clients.
 * Tables are created on the first join and dropped when the last client
 * leaves.
 */
export class TableRegistry {
  private readonly tables = new Map<string, Table>();

  constructor(private readonly deckOptions: DeckOptions = {}) {}

  get size(): number {
    return this.tables.size;
  }

  getTable(tableId: string): Table | undefined {
    return this.tables.get(tableId);
  }

  getOrCreateTable(tableId: string): Table {
    let table = this.tables.get(tableId);
    if (!table) {
      table = {
        id: tableId,
        deck: this.newDeck(),
        clients: new Set(),
        connectionsByPlayerId: new Map(),
        playerIdBySocket: new WeakMap(),
        createdAt: Date.now(),
      };
      this.tables.set(tableId, table);
    }
    return table;
  }

  /** Replace the table's deck with a fresh, shuffled one. */
  resetDeck(table: Table): void {
    table.deck = this.newDeck();
  }

  addClient(tableId: string, ws: TableSocket, playerId: string): { isReconnect: boolean } {
    const table = this.getOrCreateTable(tableId);

    const existingWs = table.connectionsByPlayerId.get(playerId);
    const isReconnect = existingWs !== undefined && existingWs !== ws;
    if (existingWs && isReconnect) {
      table.clients.delete(existingWs);
      if (existingWs.readyState === WebSocket.OPEN || existingWs.readyState === WebSocket.CONNECTING) {
        existingWs.close(4000, 'REPLACED');
      }
    }

    table.clients.add(ws);
    table.connectionsByPlayerId.set(playerId, ws);
    table.playerIdBySocket.set(ws, playerId);
    return { isReconnect };
  }

  /**
   * Returns true when the table was dropped because nobody is left.
   */
  removeClient(tableId: string, ws: TableSocket, playerId: string): boolean {
    const table = this.tables.get(tableId);
    if (!table) {
      return false;
    }

    table.clients.delete(ws);
    if (table.playerIdBySocket.get(ws) === playerId && table.connectionsByPlayerId.get(playerId) === ws) {
      table.connectionsByPlayerId.delete(playerId);
    }

    if (table.clients.size === 0) {
      this.tables.delete(tableId);
      return true;
    }
    return false;
  }

  deckState(table: Table): DeckStateMessage {
    return {
      type: 'DECK_STATE',
      tableId: table.id,
      stats: table.deck.stats(),
      popped: toCodes(table.deck.popped),
      discarded: toCodes(table.deck.discarded),
      playerIds: Array.from(table.connectionsByPlayerId.keys()),
    };
  }

  /**
   * Send the deck state to every open client of the table.
   * Returns the number of clients reached.
   */
  broadcastDeckState(tableId: string): number {
    const table = this.tables.get(tableId);
    if (!table) {
      return 0;
    }
    const message = JSON.stringify(this.deckState(table));
    let count = 0;
    for (const client of table.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
        count++;
      }
    }
    return count;
  }

  private newDeck(): Deck {
    const deck = new Deck(this.deckOptions);
    deck.shuffle();
    return deck;
  }
}
