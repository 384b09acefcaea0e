/**
 * Account commands
 *
 * Each command decides against freshly rehydrated state and is retried by the
 * controller when another writer got there first.
 */

import {
  AppError,
  type CommandOutcome,
  type ConcurrencyController,
  type EventMetadata,
} from '@streamvault/core';
import { accountAggregate, type AccountState } from './account-aggregate.js';
import type { AccountEvents } from './account-events.js';

export type AccountController = ConcurrencyController<AccountState, AccountEvents>;

/**
 * Withdrawal larger than the current balance
 */
export class InsufficientFundsError extends AppError {
  public readonly accountId: string;
  public readonly balance: number;
  public readonly requested: number;

  constructor(accountId: string, balance: number, requested: number) {
    super(
      `Account ${accountId} cannot withdraw ${requested}: balance is ${balance}`,
      'INSUFFICIENT_FUNDS',
      422
    );
    this.name = 'InsufficientFundsError';
    this.accountId = accountId;
    this.balance = balance;
    this.requested = requested;
  }
}

export class AccountAlreadyOpenError extends AppError {
  constructor(accountId: string) {
    super(`Account ${accountId} is already open`, 'ACCOUNT_ALREADY_OPEN', 409);
    this.name = 'AccountAlreadyOpenError';
  }
}

export function openAccount(
  controller: AccountController,
  accountId: string,
  owner: string,
  metadata?: EventMetadata
): Promise<CommandOutcome<AccountState>> {
  return controller.execute(accountId, (state, version) => {
    if (version > 0) {
      throw new AccountAlreadyOpenError(accountId);
    }
    return [accountAggregate.createEvent('AccountOpened', { owner }, metadata)];
  });
}

export function deposit(
  controller: AccountController,
  accountId: string,
  amount: number,
  metadata?: EventMetadata
): Promise<CommandOutcome<AccountState>> {
  return controller.execute(accountId, () => [
    accountAggregate.createEvent('Deposited', { amount }, metadata),
  ]);
}

export function withdraw(
  controller: AccountController,
  accountId: string,
  amount: number,
  metadata?: EventMetadata
): Promise<CommandOutcome<AccountState>> {
  return controller.execute(accountId, (state) => {
    if (amount > state.balance) {
      throw new InsufficientFundsError(accountId, state.balance, amount);
    }
    return [accountAggregate.createEvent('Withdrawn', { amount }, metadata)];
  });
}
