export {
  AmountSchema,
  AccountOpenedSchema,
  DepositedSchema,
  WithdrawnSchema,
  type AccountOpened,
  type Deposited,
  type Withdrawn,
  type AccountEvents,
} from './account-events.js';

export {
  accountAggregate,
  AccountStateSchema,
  INITIAL_ACCOUNT_STATE,
  type AccountState,
} from './account-aggregate.js';

export {
  openAccount,
  deposit,
  withdraw,
  InsufficientFundsError,
  AccountAlreadyOpenError,
  type AccountController,
} from './account-commands.js';

export {
  BALANCE_PROJECTION,
  BalanceRowSchema,
  balanceProjection,
  createBalanceProjection,
  readBalanceRow,
  type BalanceRow,
} from './balance-projection.js';
