import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app.js';

describe('http api', () => {
  let app: FastifyInstance;

  beforeEach(() => {
    app = buildApp({ env: { LOG_LEVEL: 'silent', TABLE_JWT_SECRET: 'test-secret-placeholder' } });
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true });
  });

  it('evaluates a hand', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/hands/evaluate',
      payload: { cards: ['5C', 'AS', '5H', 'KS', '2D', 'KD', '7H'] },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      handRank: 2,
      handName: 'Two Pair',
      handCards: ['KS', 'KD', '5C', '5H'],
      kickers: ['AS'],
      cards: ['AS', 'KS', 'KD', '7H', '5C', '5H', '2D'],
    });
  });

  it('rejects fewer than five cards', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/hands/evaluate',
      payload: { cards: ['AS', 'KS', 'QS', 'JS'] },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe('INVALID_REQUEST');
  });

  it('rejects unknown card codes', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/hands/evaluate',
      payload: { cards: ['AS', 'KS', 'QS', 'JS', 'XX'] },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: 'INVALID_REQUEST',
      message: 'cards.4: Invalid card code',
    });
  });

  it('compares two hands', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/hands/compare',
      payload: {
        a: ['7H', 'JS', 'QH', 'JD', 'JC', 'AH', 'JH'],
        b: ['KC', 'QH', 'JH', 'TH', '9H', '8H', '7H'],
      },
    });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ result: -1 });
  });

  it('settles a showdown', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/showdown',
      payload: {
        board: ['KH', 'QD', '7S', '4C', '2H'],
        seats: [
          { id: 'bob', hole: ['KS', '9C'] },
          { id: 'alice', hole: ['AS', 'AD'] },
        ],
      },
    });
    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.winners).toEqual(['alice']);
    expect(body.ranked[1]).toEqual({
      id: 'bob',
      handRank: 1,
      handName: 'One Pair',
      handCards: ['KS', 'KH'],
      kickers: ['QD', '9C', '7S'],
      cards: ['KS', 'KH', 'QD', '9C', '7S', '4C', '2H'],
    });
  });

  it('rejects a card dealt twice', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/showdown',
      payload: {
        board: ['KH', 'QD', '7S', '4C', '2H'],
        seats: [
          { id: 'bob', hole: ['KH', '9C'] },
          { id: 'alice', hole: ['AS', 'AD'] },
        ],
      },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: 'DUPLICATE_CARD',
      message: 'Card KH appears more than once',
    });
  });

  it('rejects a repeated card in a single hand', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/hands/evaluate',
      payload: { cards: ['AS', 'AS', 'AS', 'AS', 'AS'] },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: 'DUPLICATE_CARD',
      message: 'Card AS appears more than once',
    });
  });

  it('checks each compared hand for repeats on its own', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/hands/compare',
      payload: {
        a: ['7H', 'JS', 'QH', 'JD', 'JC'],
        b: ['KC', 'QH', '9H', 'KC', '7H'],
      },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: 'DUPLICATE_CARD',
      message: 'Card KC appears more than once',
    });
  });

  it('rejects seats that cannot make five cards', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/showdown',
      payload: {
        board: ['KH', 'QD', '7S'],
        seats: [
          { id: 'bob', hole: ['KS'] },
          { id: 'alice', hole: ['AS', 'AD'] },
        ],
      },
    });
    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe('INSUFFICIENT_CARDS');
  });

  it('rejects a body that is not JSON', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/hands/evaluate',
      headers: { 'content-type': 'application/json' },
      payload: '{"cards":',
    });
    expect(response.statusCode).toBe(400);
  });
});
