import { z } from 'zod';
import {
  formatCard,
  parseCard,
  type Card,
  type DeckStats,
  type HandRank,
  type PokerHand,
} from '@cardroom/cards';

// Cards travel as two-character codes: rank then suit, e.g. "AS", "TH"
export const CardCodeSchema = z
  .string()
  .regex(/^[AKQJT98765432][SHDC]$/, 'Invalid card code')
  .transform((code) => parseCard(code));

export const PositionSchema = z.enum(['top', 'bottom']).default('bottom');

// HTTP request bodies
export const EvaluateRequestSchema = z.object({
  cards: z.array(CardCodeSchema).min(5),
});

export const CompareRequestSchema = z.object({
  a: z.array(CardCodeSchema).min(5),
  b: z.array(CardCodeSchema).min(5),
});

export const ShowdownRequestSchema = z.object({
  board: z.array(CardCodeSchema).max(5),
  seats: z
    .array(
      z.object({
        id: z.string().min(1),
        hole: z.array(CardCodeSchema).min(1),
      })
    )
    .min(2),
});

export type EvaluateRequest = z.infer<typeof EvaluateRequestSchema>;
export type CompareRequest = z.infer<typeof CompareRequestSchema>;
export type ShowdownRequest = z.infer<typeof ShowdownRequestSchema>;

// Client -> Server messages
export const HelloMessageSchema = z.object({
  type: z.literal('HELLO'),
  tableId: z.string().min(1),
  accessToken: z.string(),
});

export const PingMessageSchema = z.object({
  type: z.literal('PING'),
});

export const ShuffleMessageSchema = z.object({
  type: z.literal('SHUFFLE'),
  tableId: z.string(),
});

export const DealMessageSchema = z.object({
  type: z.literal('DEAL'),
  tableId: z.string(),
  count: z.number().int().min(1).max(52).default(1),
});

export const BurnMessageSchema = z.object({
  type: z.literal('BURN'),
  tableId: z.string(),
});

export const ReturnCardsMessageSchema = z.object({
  type: z.literal('RETURN_CARDS'),
  tableId: z.string(),
  cards: z.array(CardCodeSchema).min(1),
  position: PositionSchema,
});

export const ReturnPoppedMessageSchema = z.object({
  type: z.literal('RETURN_POPPED'),
  tableId: z.string(),
  position: PositionSchema,
});

export const ReturnDiscardedMessageSchema = z.object({
  type: z.literal('RETURN_DISCARDED'),
  tableId: z.string(),
  position: PositionSchema,
});

export const ReturnAllMessageSchema = z.object({
  type: z.literal('RETURN_ALL'),
  tableId: z.string(),
});

export const ResetMessageSchema = z.object({
  type: z.literal('RESET'),
  tableId: z.string(),
});

export const SyncRequestMessageSchema = z.object({
  type: z.literal('SYNC_REQUEST'),
  tableId: z.string(),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  HelloMessageSchema,
  PingMessageSchema,
  ShuffleMessageSchema,
  DealMessageSchema,
  BurnMessageSchema,
  ReturnCardsMessageSchema,
  ReturnPoppedMessageSchema,
  ReturnDiscardedMessageSchema,
  ReturnAllMessageSchema,
  ResetMessageSchema,
  SyncRequestMessageSchema,
]);

export type HelloMessage = z.infer<typeof HelloMessageSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;
export type TableMessage = Exclude<ClientMessage, { type: 'HELLO' | 'PING' }>;

// Server -> Client messages
export type WelcomeMessage = {
  type: 'WELCOME';
  tableId: string;
  playerId: string;
};

export type PongMessage = {
  type: 'PONG';
};

export type DealtMessage = {
  type: 'DEALT';
  tableId: string;
  cards: string[];
};

export type DeckStateMessage = {
  type: 'DECK_STATE';
  tableId: string;
  stats: DeckStats;
  popped: string[];
  discarded: string[];
  playerIds: string[];
};

export type ActionErrorMessage = {
  type: 'ACTION_ERROR';
  code: string;
  message?: string;
};

export type ErrorMessage = {
  type: 'ERROR';
  code: string;
  message?: string;
};

export type ServerMessage =
  | WelcomeMessage
  | PongMessage
  | DealtMessage
  | DeckStateMessage
  | ActionErrorMessage
  | ErrorMessage;

// HTTP responses
export type HandView = {
  handRank: HandRank;
  handName: string;
  handCards: string[];
  kickers: string[];
  cards: string[];
};

export function toCodes(cards: readonly Card[]): string[] {
  return cards.map(formatCard);
}

export function toHandView(hand: PokerHand): HandView {
  return {
    handRank: hand.handRank,
    handName: hand.handName,
    handCards: toCodes(hand.handCards),
    kickers: toCodes(hand.kickers),
    cards: toCodes(hand.cards),
  };
}
