import { jwtVerify } from 'jose';

export interface TableGrant {
  playerId: string;
  tableId: string;
}

/**
 * Verify a dealer-table access token. `sub` names the player and the
 * `table` claim names the one table the token admits them to.
 */
export async function verifyTableToken(
  token: string,
  secret: string,
  tableId: string
): Promise<TableGrant> {
  try {
    const key = new TextEncoder().encode(secret);
    const { payload } = await jwtVerify(token, key, {
      algorithms: ['HS256'],
    });

    const playerId = payload.sub;
    if (!playerId) {
      throw new Error('Invalid token: missing sub claim');
    }
    if (typeof payload.table !== 'string') {
      throw new Error('Invalid token: missing table claim');
    }
    if (payload.table !== tableId) {
      throw new Error(`Invalid token: issued for table ${payload.table}`);
    }

    return { playerId, tableId };
  } catch (error) {
    throw new Error('Invalid access token', { cause: error });
  }
}
