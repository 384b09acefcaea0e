/**
 * Account balance read model
 * One row per account, keyed by stream id
 */

import { z } from 'zod';
import {
  defineProjection,
  type ProjectionDefinition,
  type ReadModelAccess,
} from '@streamvault/core';
import type { EventEnvelope } from '@streamvault/types';
import { AccountOpenedSchema, DepositedSchema, WithdrawnSchema } from './account-events.js';

export const BALANCE_PROJECTION = 'account-balances';

export const BalanceRowSchema = z.object({
  owner: z.string().nullable(),
  balance: z.number(),
  lastVersion: z.number().int().nonnegative(),
});

export type BalanceRow = z.infer<typeof BalanceRowSchema>;

const EMPTY_ROW: BalanceRow = { owner: null, balance: 0, lastVersion: 0 };

export async function readBalanceRow(readModel: ReadModelAccess, accountId: string): Promise<BalanceRow> {
  const stored = await readModel.get(accountId);
  return stored === undefined ? { ...EMPTY_ROW } : BalanceRowSchema.parse(stored);
}

async function adjustBalance(
  readModel: ReadModelAccess,
  event: EventEnvelope,
  delta: number
): Promise<void> {
  const row = await readBalanceRow(readModel, event.streamId);
  await readModel.put(event.streamId, {
    ...row,
    balance: row.balance + delta,
    lastVersion: event.version,
  });
}

export function createBalanceProjection(version = 1): ProjectionDefinition {
  return defineProjection(BALANCE_PROJECTION, version)
    .onPayload('AccountOpened', AccountOpenedSchema, async (readModel, { owner }, event) => {
      const row = await readBalanceRow(readModel, event.streamId);
      await readModel.put(event.streamId, { ...row, owner, lastVersion: event.version });
    })
    .onPayload('Deposited', DepositedSchema, (readModel, { amount }, event) =>
      adjustBalance(readModel, event, amount)
    )
    .onPayload('Withdrawn', WithdrawnSchema, (readModel, { amount }, event) =>
      adjustBalance(readModel, event, -amount)
    )
    .build();
}

export const balanceProjection = createBalanceProjection();
