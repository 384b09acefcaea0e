/**
 * Bank account aggregate
 * Balance and counters folded from the account stream
 */

import { z } from 'zod';
import { defineAggregate } from '@streamvault/core';
import {
  AccountOpenedSchema,
  DepositedSchema,
  WithdrawnSchema,
  type AccountEvents,
} from './account-events.js';

export const AccountStateSchema = z.object({
  owner: z.string().nullable(),
  balance: z.number(),
  deposits: z.number().int().nonnegative(),
  withdrawals: z.number().int().nonnegative(),
});

export type AccountState = z.infer<typeof AccountStateSchema>;

export const INITIAL_ACCOUNT_STATE: AccountState = {
  owner: null,
  balance: 0,
  deposits: 0,
  withdrawals: 0,
};

export const accountAggregate = defineAggregate<AccountState, AccountEvents>({
  name: 'Account',
  initialState: INITIAL_ACCOUNT_STATE,
  stateSchema: AccountStateSchema,
  schemas: {
    AccountOpened: AccountOpenedSchema,
    Deposited: DepositedSchema,
    Withdrawn: WithdrawnSchema,
  },
  handlers: {
    AccountOpened: (state, { owner }) => ({ ...state, owner }),
    Deposited: (state, { amount }) => ({
      ...state,
      balance: state.balance + amount,
      deposits: state.deposits + 1,
    }),
    Withdrawn: (state, { amount }) => ({
      ...state,
      balance: state.balance - amount,
      withdrawals: state.withdrawals + 1,
    }),
  },
});
