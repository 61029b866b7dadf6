import { DynamicModule, Module, Provider } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { SHIPMENT_STEP_GRAPH } from './definitions/shipment-step-graph';
import { StepMachine } from './engines/step-machine.engine';
import type { CompletionTrigger } from './interfaces/collaborators.interface';
import type { ISessionDbAdapter } from './interfaces/session-db-adapter.interface';
import type {
  ResolvedSessionOptions,
  ShipmentSessionModuleAsyncOptions,
  ShipmentSessionModuleOptions,
} from './interfaces/session-module-options.interface';
import { CheckoutService } from './services/checkout.service';
import { CompletionNotifier } from './services/completion-notifier.service';
import { PaymentCompletionCoordinator } from './services/payment-completion-coordinator.service';
import { QuoteCache } from './services/quote-cache.service';
import { QuoteService } from './services/quote.service';
import { SessionStore } from './services/session-store.service';
import { SessionSweepService } from './services/session-sweep.service';
import { TemplateService } from './services/template.service';
import { UserLockRegistry } from './services/user-lock-registry.service';
import { WorkflowController } from './services/workflow-controller.service';
import { selectArchiveStrategy } from './strategies/archive-strategy';
import { assertTableName } from './utils/assert-table-name';
import {
  ARCHIVE_STRATEGY,
  COMPLETION_TRIGGER,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_QUOTE_TTL_SECONDS,
  DEFAULT_SESSION_TABLE,
  DEFAULT_SESSION_TTL_SECONDS,
  DEFAULT_SWEEP_CRON_EXPRESSION,
  LEDGER_DB_ADAPTER,
  PAYMENT_PROVIDER,
  RATE_PROVIDER,
  RAW_SESSION_MODULE_OPTIONS,
  SESSION_DB_ADAPTER,
  SESSION_MODULE_OPTIONS,
  STEP_MACHINE,
} from './session.constants';

const NOOP_COMPLETION_TRIGGER: CompletionTrigger = {
  onPaymentCompleted: async () => undefined,
};

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

export function resolveSessionOptions(
  options: ShipmentSessionModuleOptions,
): ResolvedSessionOptions {
  const sessionTableName = options.sessionTableName ?? DEFAULT_SESSION_TABLE;
  assertTableName(sessionTableName);

  return {
    sessionTableName,
    sessionTtlSeconds: requirePositive(
      'sessionTtlSeconds',
      options.sessionTtlSeconds ?? DEFAULT_SESSION_TTL_SECONDS,
    ),
    quoteTtlSeconds: requirePositive(
      'quoteTtlSeconds',
      options.quoteTtlSeconds ?? DEFAULT_QUOTE_TTL_SECONDS,
    ),
    lockTimeoutMs: requirePositive(
      'lockTimeoutMs',
      options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS,
    ),
    sweepCronExpression:
      options.sweepCronExpression ?? DEFAULT_SWEEP_CRON_EXPRESSION,
    enableSessionSweep: options.enableSessionSweep ?? true,
  };
}

/** Everything derived from the raw options, for both registration styles. */
function createDerivedProviders(): Provider[] {
  const fromOptions = <T>(
    provide: symbol,
    pick: (options: ShipmentSessionModuleOptions) => T,
  ): Provider => ({
    provide,
    useFactory: pick,
    inject: [RAW_SESSION_MODULE_OPTIONS],
  });

  return [
    fromOptions(SESSION_MODULE_OPTIONS, resolveSessionOptions),
    fromOptions(SESSION_DB_ADAPTER, (options) => options.sessionAdapter),
    fromOptions(LEDGER_DB_ADAPTER, (options) => options.ledgerAdapter),
    fromOptions(RATE_PROVIDER, (options) => options.rateProvider),
    fromOptions(PAYMENT_PROVIDER, (options) => options.paymentProvider),
    fromOptions(
      COMPLETION_TRIGGER,
      (options) => options.completionTrigger ?? NOOP_COMPLETION_TRIGGER,
    ),
    {
      provide: ARCHIVE_STRATEGY,
      useFactory: (adapter: ISessionDbAdapter) =>
        selectArchiveStrategy(adapter.capabilities),
      inject: [SESSION_DB_ADAPTER],
    },
    {
      provide: STEP_MACHINE,
      useFactory: () => new StepMachine(SHIPMENT_STEP_GRAPH),
    },
    UserLockRegistry,
    QuoteCache,
    QuoteService,
    SessionStore,
    CompletionNotifier,
    CheckoutService,
    TemplateService,
    PaymentCompletionCoordinator,
    WorkflowController,
    SessionSweepService,
  ];
}

const EXPORTS = [
  WorkflowController,
  PaymentCompletionCoordinator,
  CheckoutService,
  TemplateService,
  QuoteService,
  QuoteCache,
  SessionStore,
  UserLockRegistry,
  SessionSweepService,
  SESSION_DB_ADAPTER,
  LEDGER_DB_ADAPTER,
];

@Module({})
export class ShipmentSessionModule {
  static forRoot(options: ShipmentSessionModuleOptions): DynamicModule {
    return {
      module: ShipmentSessionModule,
      imports: [ScheduleModule.forRoot(), EventEmitterModule.forRoot()],
      providers: [
        { provide: RAW_SESSION_MODULE_OPTIONS, useValue: options },
        ...createDerivedProviders(),
      ],
      exports: EXPORTS,
      global: true,
    };
  }

  static forRootAsync(options: ShipmentSessionModuleAsyncOptions): DynamicModule {
    return {
      module: ShipmentSessionModule,
      imports: [
        ScheduleModule.forRoot(),
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: RAW_SESSION_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        ...createDerivedProviders(),
      ],
      exports: EXPORTS,
      global: true,
    };
  }
}
