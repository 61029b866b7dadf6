import { EventEmitter2 } from '@nestjs/event-emitter';
import { InMemoryLedgerAdapter } from '../src/adapters/in-memory-ledger.adapter';
import {
  InMemorySessionAdapter,
  type InMemoryAdapterOptions,
} from '../src/adapters/in-memory-session.adapter';
import { SHIPMENT_STEP_GRAPH } from '../src/definitions/shipment-step-graph';
import { StepMachine } from '../src/engines/step-machine.engine';
import type {
  CompletionNotice,
  CompletionTrigger,
  CreateInvoiceInput,
  Invoice,
  PaymentProvider,
  RateProvider,
  RawQuote,
  ShipmentDescriptor,
} from '../src/interfaces/collaborators.interface';
import type { ILedgerDbAdapter } from '../src/interfaces/ledger-db-adapter.interface';
import type { ISessionDbAdapter } from '../src/interfaces/session-db-adapter.interface';
import type { ResolvedSessionOptions } from '../src/interfaces/session-module-options.interface';
import type { SessionRecord } from '../src/interfaces/session-records.interface';
import { CheckoutService } from '../src/services/checkout.service';
import { CompletionNotifier } from '../src/services/completion-notifier.service';
import { PaymentCompletionCoordinator } from '../src/services/payment-completion-coordinator.service';
import { QuoteCache } from '../src/services/quote-cache.service';
import { QuoteService } from '../src/services/quote.service';
import { SessionStore } from '../src/services/session-store.service';
import { TemplateService } from '../src/services/template.service';
import { UserLockRegistry } from '../src/services/user-lock-registry.service';
import { WorkflowController } from '../src/services/workflow-controller.service';
import { selectArchiveStrategy } from '../src/strategies/archive-strategy';

export const TEST_TABLE = 'shipment_sessions';

export function createTestOptions(
  overrides: Partial<ResolvedSessionOptions> = {},
): ResolvedSessionOptions {
  return {
    sessionTableName: TEST_TABLE,
    sessionTtlSeconds: 900,
    quoteTtlSeconds: 3600,
    lockTimeoutMs: 1000,
    sweepCronExpression: '*/60 * * * * *',
    enableSessionSweep: false,
    ...overrides,
  };
}

export function createSessionRecord(
  overrides: Partial<SessionRecord> = {},
): SessionRecord {
  return {
    userKey: 'u1',
    orderCorrelationId: 'ORD-20240101000000-aaaaaaaa',
    currentStep: 'START',
    fields: {},
    createdAt: new Date('2024-01-01T00:00:00.000Z'),
    lastTouchedAt: new Date('2024-01-01T00:00:00.000Z'),
    ...overrides,
  };
}

export function createMockSessionAdapter(
  transactions = true,
): jest.Mocked<ISessionDbAdapter> {
  const mockAdapter: jest.Mocked<ISessionDbAdapter> = {
    capabilities: { transactions },
    upsertSession: jest.fn().mockResolvedValue(createSessionRecord()),
    patchSession: jest.fn().mockResolvedValue(null),
    findSession: jest.fn().mockResolvedValue(null),
    deleteSession: jest.fn().mockResolvedValue(true),
    deleteStale: jest.fn().mockResolvedValue([]),
    insertArchive: jest.fn().mockResolvedValue(undefined),
    findArchived: jest.fn().mockResolvedValue([]),
    saveTemplate: jest.fn().mockResolvedValue(null),
    findTemplates: jest.fn().mockResolvedValue([]),
    findTemplate: jest.fn().mockResolvedValue(null),
    deleteTemplate: jest.fn().mockResolvedValue(false),
    transaction: jest.fn().mockImplementation(async (cb) => cb(mockAdapter)),
  };
  return mockAdapter;
}

export function createMockLedgerAdapter(
  transactions = true,
): jest.Mocked<ILedgerDbAdapter> {
  const mockAdapter: jest.Mocked<ILedgerDbAdapter> = {
    capabilities: { transactions },
    findPayment: jest.fn().mockResolvedValue(null),
    insertPayment: jest.fn().mockResolvedValue(undefined),
    markPaymentPaid: jest.fn().mockResolvedValue(true),
    closePayment: jest.fn().mockResolvedValue(true),
    incrementBalance: jest.fn().mockResolvedValue(0),
    debitBalance: jest.fn().mockResolvedValue(null),
    getBalance: jest.fn().mockResolvedValue(0),
    insertOrder: jest.fn().mockResolvedValue(undefined),
    findOrder: jest.fn().mockResolvedValue(null),
    markOrderPaid: jest.fn().mockResolvedValue(true),
    transaction: jest.fn().mockImplementation(async (cb) => cb(mockAdapter)),
  };
  return mockAdapter;
}

export const SAMPLE_RAW_QUOTES: RawQuote[] = [
  { id: 'ups-ground', carrier: 'UPS', service: 'Ground', amount: '12.50', estimatedDays: 5 },
  { id: 'usps-priority', carrier: 'USPS', service: 'Priority', amount: 8.25, estimatedDays: 3 },
  { id: 'broken', carrier: 'FedEx', service: 'Express', amount: 'n/a' },
];

export class FakeRateProvider implements RateProvider {
  readonly calls: ShipmentDescriptor[] = [];
  failure: Error | null = null;

  constructor(private readonly quotes: RawQuote[] = SAMPLE_RAW_QUOTES) {}

  async fetchQuotes(descriptor: ShipmentDescriptor): Promise<RawQuote[]> {
    this.calls.push(descriptor);
    if (this.failure) {
      throw this.failure;
    }
    return this.quotes.map((quote) => ({ ...quote }));
  }
}

export class FakePaymentProvider implements PaymentProvider {
  readonly invoices: CreateInvoiceInput[] = [];
  failure: Error | null = null;

  async createInvoice(input: CreateInvoiceInput): Promise<Invoice> {
    if (this.failure) {
      throw this.failure;
    }
    this.invoices.push(input);
    const externalReference = `inv-${this.invoices.length}`;
    return {
      externalReference,
      paymentUrl: `https://pay.example.test/${externalReference}`,
    };
  }
}

export class RecordingCompletionTrigger implements CompletionTrigger {
  readonly notices: CompletionNotice[] = [];
  failure: Error | null = null;

  async onPaymentCompleted(notice: CompletionNotice): Promise<void> {
    this.notices.push(notice);
    if (this.failure) {
      throw this.failure;
    }
  }
}

export interface TestHarness {
  options: ResolvedSessionOptions;
  sessionAdapter: InMemorySessionAdapter;
  ledger: InMemoryLedgerAdapter;
  rateProvider: FakeRateProvider;
  paymentProvider: FakePaymentProvider;
  trigger: RecordingCompletionTrigger;
  emitter: EventEmitter2;
  machine: StepMachine;
  locks: UserLockRegistry;
  quoteCache: QuoteCache;
  quoteService: QuoteService;
  store: SessionStore;
  checkout: CheckoutService;
  templates: TemplateService;
  coordinator: PaymentCompletionCoordinator;
  controller: WorkflowController;
}

/** Wires every service by hand on top of the in-memory adapters. */
export function createHarness(
  config: {
    options?: Partial<ResolvedSessionOptions>;
    sessionAdapter?: InMemoryAdapterOptions;
    ledger?: InMemoryAdapterOptions;
  } = {},
): TestHarness {
  const options = createTestOptions(config.options);
  const sessionAdapter = new InMemorySessionAdapter(config.sessionAdapter);
  const ledger = new InMemoryLedgerAdapter(config.ledger);
  const rateProvider = new FakeRateProvider();
  const paymentProvider = new FakePaymentProvider();
  const trigger = new RecordingCompletionTrigger();
  const emitter = new EventEmitter2();
  const machine = new StepMachine(SHIPMENT_STEP_GRAPH);

  const locks = new UserLockRegistry(options);
  const quoteCache = new QuoteCache(options);
  const quoteService = new QuoteService(quoteCache, rateProvider);
  const store = new SessionStore(
    sessionAdapter,
    selectArchiveStrategy(sessionAdapter.capabilities),
    machine,
    emitter,
    options,
  );
  const notifier = new CompletionNotifier(trigger);
  const checkout = new CheckoutService(ledger, paymentProvider, store, notifier);
  const templates = new TemplateService(sessionAdapter, options);
  const coordinator = new PaymentCompletionCoordinator(ledger, notifier, emitter);
  const controller = new WorkflowController(
    store,
    locks,
    quoteService,
    checkout,
    templates,
    machine,
    emitter,
  );

  return {
    options,
    sessionAdapter,
    ledger,
    rateProvider,
    paymentProvider,
    trigger,
    emitter,
    machine,
    locks,
    quoteCache,
    quoteService,
    store,
    checkout,
    templates,
    coordinator,
    controller,
  };
}

/** Inputs that walk a session from START to CONFIRM_DATA. */
export const DATA_ENTRY_INPUTS: readonly string[] = [
  'new order',
  'John Smith',
  '123 Main St',
  'skip',
  'New York',
  'ny',
  '10001',
  '2125550123',
  'Jane Doe',
  '456 Oak Ave',
  'Suite 5',
  'Los Angeles',
  'CA',
  '90001',
  '-',
  '5.5',
  '10',
  '8',
  '6',
];

export async function advanceAll(
  controller: WorkflowController,
  userKey: string,
  inputs: readonly string[],
): Promise<void> {
  for (const input of inputs) {
    await controller.advance(userKey, input);
  }
}
