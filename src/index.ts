import 'reflect-metadata';

// Module
export {
  ShipmentSessionModule,
  resolveSessionOptions,
} from './shipment-session.module';

// Services
export { WorkflowController } from './services/workflow-controller.service';
export { SessionStore } from './services/session-store.service';
export { UserLockRegistry } from './services/user-lock-registry.service';
export { QuoteCache } from './services/quote-cache.service';
export type {
  QuoteCacheEntry,
  QuoteCacheStats,
} from './services/quote-cache.service';
export {
  QuoteService,
  normalizeQuotes,
  toShipmentDescriptor,
} from './services/quote.service';
export type { GetQuotesOptions } from './services/quote.service';
export { PaymentCompletionCoordinator } from './services/payment-completion-coordinator.service';
export {
  CheckoutService,
  MIN_TOPUP_AMOUNT,
  MAX_TOPUP_AMOUNT,
} from './services/checkout.service';
export { CompletionNotifier } from './services/completion-notifier.service';
export { SessionSweepService } from './services/session-sweep.service';
export type { SessionSweepResult } from './services/session-sweep.service';
export {
  TemplateService,
  normalizeTemplateName,
} from './services/template.service';

// Step graph
export { StepMachine } from './engines/step-machine.engine';
export { SHIPMENT_STEP_GRAPH, isSkipInput } from './definitions/shipment-step-graph';
export {
  SHIPMENT_STEPS,
  INITIAL_STEP,
  TEMPLATE_ENTRY_STEP,
  TERMINAL_STEPS,
  isStepId,
  isTerminalStep,
} from './definitions/shipment-steps';
export type { StepId } from './definitions/shipment-steps';
export { validateStepGraph } from './utils/validate-step-graph';

// Strategies
export {
  SequentialArchiveStrategy,
  TransactionalArchiveStrategy,
  selectArchiveStrategy,
} from './strategies/archive-strategy';
export type { ArchiveInput, ArchiveStrategy } from './strategies/archive-strategy';

// Interfaces
export type {
  AdapterCapabilities,
  ISessionDbAdapter,
  PatchSessionInput,
  SaveTemplateInput,
  UpsertSessionInput,
} from './interfaces/session-db-adapter.interface';
export type { ILedgerDbAdapter } from './interfaces/ledger-db-adapter.interface';
export type {
  CompletionNotice,
  CompletionTrigger,
  CreateInvoiceInput,
  Invoice,
  PaymentProvider,
  Quote,
  RateProvider,
  RawQuote,
  ShipmentDescriptor,
} from './interfaces/collaborators.interface';
export type {
  OrderPaymentStatus,
  OrderRecord,
  PaymentEvent,
  PaymentKind,
  PaymentMethod,
  PaymentOutcome,
  PaymentRecord,
  PaymentStatus,
} from './interfaces/ledger-records.interface';
export type {
  ArchivedSessionRecord,
  ArchivePayload,
  Session,
  SessionRecord,
  SessionUpdate,
  ShipmentFieldKey,
  ShipmentFields,
  ShipmentTemplate,
  TemplateFieldKey,
  TemplateFields,
  TemplateRecord,
} from './interfaces/session-records.interface';
export type {
  StepAcceptance,
  StepEffect,
  StepGraph,
  StepNode,
} from './interfaces/step-graph.interface';
export type {
  CheckoutResult,
  PromptDescriptor,
  PromptSignal,
} from './interfaces/prompt-descriptor.interface';
export type {
  ResolvedSessionOptions,
  ShipmentSessionModuleAsyncOptions,
  ShipmentSessionModuleOptions,
} from './interfaces/session-module-options.interface';

// Adapters
export { InMemorySessionAdapter } from './adapters/in-memory-session.adapter';
export type { InMemoryAdapterOptions } from './adapters/in-memory-session.adapter';
export { InMemoryLedgerAdapter } from './adapters/in-memory-ledger.adapter';
export { PgSessionAdapter } from './adapters/pg-session.adapter';
export {
  PgLedgerAdapter,
  DEFAULT_LEDGER_TABLE_PREFIX,
} from './adapters/pg-ledger.adapter';
export { DrizzleSessionAdapter } from './adapters/drizzle-session.adapter';
export type { DrizzleExecutor } from './adapters/drizzle-session.adapter';

// Errors
export { ValidationError } from './errors/validation.error';
export { SessionExpiredError } from './errors/session-expired.error';
export { DuplicateEventError } from './errors/duplicate-event.error';
export { UnknownReferenceError } from './errors/unknown-reference.error';
export { TransactionUnsupportedError } from './errors/transaction-unsupported.error';
export { LockTimeoutError } from './errors/lock-timeout.error';
export { InvalidStepGraphError } from './errors/invalid-step-graph.error';
export { InvalidSessionRecordError } from './errors/invalid-session-record.error';
export { InsufficientBalanceError } from './errors/insufficient-balance.error';
export { QuoteFetchError } from './errors/quote-fetch.error';

// Events
export { SessionEventType } from './events/session-event-type.enum';
export type {
  PaymentAppliedEvent,
  PaymentIgnoredEvent,
  SessionArchivedEvent,
  SessionCancelledEvent,
  SessionCreatedEvent,
  SessionExpiredEvent,
  SessionRolledBackEvent,
  SessionTransitionEvent,
} from './events/session-events';

// Utils
export { quoteFingerprint } from './utils/quote-fingerprint';
export { generateOrderCorrelationId } from './utils/generate-order-correlation-id';
export {
  validateAddress,
  validateCity,
  validateDimension,
  validateName,
  validatePhone,
  validateStateCode,
  validateWeight,
  validateZip,
} from './utils/field-validators';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  SESSION_MODULE_OPTIONS,
  SESSION_DB_ADAPTER,
  LEDGER_DB_ADAPTER,
  ARCHIVE_STRATEGY,
  STEP_MACHINE,
  RATE_PROVIDER,
  PAYMENT_PROVIDER,
  COMPLETION_TRIGGER,
  DEFAULT_SESSION_TABLE,
  DEFAULT_SESSION_TTL_SECONDS,
  DEFAULT_QUOTE_TTL_SECONDS,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_SWEEP_CRON_EXPRESSION,
  DEFAULT_ARCHIVE_LIST_LIMIT,
  MAX_TEMPLATES_PER_USER,
  TEMPLATE_NAME_MAX_LENGTH,
  SESSION_SWEEP_JOB,
} from './session.constants';
