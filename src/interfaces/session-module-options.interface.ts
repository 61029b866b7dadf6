import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { ISessionDbAdapter } from './session-db-adapter.interface';
import type { ILedgerDbAdapter } from './ledger-db-adapter.interface';
import type {
  CompletionTrigger,
  PaymentProvider,
  RateProvider,
} from './collaborators.interface';

export interface ShipmentSessionModuleOptions {
  /** Session persistence adapter */
  sessionAdapter: ISessionDbAdapter;
  /** Payments, orders and balances persistence adapter */
  ledgerAdapter: ILedgerDbAdapter;
  rateProvider: RateProvider;
  paymentProvider: PaymentProvider;
  /** Invoked once per completed payment. Default: no-op */
  completionTrigger?: CompletionTrigger;

  /** Live session table name. Default: 'shipment_sessions' */
  sessionTableName?: string;

  /** Inactivity window after which a session is gone. Default: 900 */
  sessionTtlSeconds?: number;

  /** Quote cache entry lifetime. Default: 3600 */
  quoteTtlSeconds?: number;

  /** Max wait for a per-user lock. Default: 10000 */
  lockTimeoutMs?: number;

  /** Cron expression for the stale-session sweep. Default: every 60 seconds */
  sweepCronExpression?: string;

  /** Enable internal sweep cron registration. Default: true */
  enableSessionSweep?: boolean;
}

export interface ResolvedSessionOptions {
  sessionTableName: string;
  sessionTtlSeconds: number;
  quoteTtlSeconds: number;
  lockTimeoutMs: number;
  sweepCronExpression: string;
  enableSessionSweep: boolean;
}

export interface ShipmentSessionModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: FactoryProvider<ShipmentSessionModuleOptions>['useFactory'];
  inject?: FactoryProvider['inject'];
}
