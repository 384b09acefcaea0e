/**
 * @fileoverview Domain Package Exports
 *
 * Example bounded context built on the event-sourcing core: a bank account
 * aggregate with its commands and a balance read model.
 *
 * @module @streamvault/domain
 *
 * @example
 * ```typescript
 * import { createEventSourcingEngine } from '@streamvault/core';
 * import { accountAggregate, balanceProjection, deposit } from '@streamvault/domain';
 *
 * const engine = createEventSourcingEngine();
 * engine.registerProjection(balanceProjection);
 *
 * const accounts = engine.createController(accountAggregate);
 * await deposit(accounts, 'acct-42', 100);
 * ```
 */

export * from './account/index.js';
