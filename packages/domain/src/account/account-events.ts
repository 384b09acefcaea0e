import { z } from 'zod';

/**
 * Bank account events
 */

export const AmountSchema = z.number().positive().finite();

export const AccountOpenedSchema = z.object({
  owner: z.string().min(1),
});

export const DepositedSchema = z.object({
  amount: AmountSchema,
});

export const WithdrawnSchema = z.object({
  amount: AmountSchema,
});

export type AccountOpened = z.infer<typeof AccountOpenedSchema>;
export type Deposited = z.infer<typeof DepositedSchema>;
export type Withdrawn = z.infer<typeof WithdrawnSchema>;

export type AccountEvents = {
  AccountOpened: AccountOpened;
  Deposited: Deposited;
  Withdrawn: Withdrawn;
};
