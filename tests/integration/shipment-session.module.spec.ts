import { Test, TestingModule } from '@nestjs/testing';
import { SchedulerRegistry } from '@nestjs/schedule';
import { InMemoryLedgerAdapter } from '../../src/adapters/in-memory-ledger.adapter';
import { InMemorySessionAdapter } from '../../src/adapters/in-memory-session.adapter';
import type { ShipmentSessionModuleOptions } from '../../src/interfaces/session-module-options.interface';
import { CheckoutService } from '../../src/services/checkout.service';
import { PaymentCompletionCoordinator } from '../../src/services/payment-completion-coordinator.service';
import { SessionStore } from '../../src/services/session-store.service';
import { TemplateService } from '../../src/services/template.service';
import { WorkflowController } from '../../src/services/workflow-controller.service';
import {
  LEDGER_DB_ADAPTER,
  SESSION_DB_ADAPTER,
  SESSION_SWEEP_JOB,
} from '../../src/session.constants';
import {
  resolveSessionOptions,
  ShipmentSessionModule,
} from '../../src/shipment-session.module';
import { FakePaymentProvider, FakeRateProvider } from '../helpers';

function createModuleOptions(
  overrides: Partial<ShipmentSessionModuleOptions> = {},
): ShipmentSessionModuleOptions {
  return {
    sessionAdapter: new InMemorySessionAdapter(),
    ledgerAdapter: new InMemoryLedgerAdapter(),
    rateProvider: new FakeRateProvider(),
    paymentProvider: new FakePaymentProvider(),
    enableSessionSweep: false,
    ...overrides,
  };
}

describe('ShipmentSessionModule integration', () => {
  let module: TestingModule | undefined;

  afterEach(async () => {
    if (module) {
      await module.close();
      module = undefined;
    }
  });

  it('should bootstrap with forRoot and expose the adapters', async () => {
    const options = createModuleOptions();
    module = await Test.createTestingModule({
      imports: [ShipmentSessionModule.forRoot(options)],
    }).compile();

    await module.init();

    expect(module.get(WorkflowController)).toBeInstanceOf(WorkflowController);
    expect(module.get(SESSION_DB_ADAPTER)).toBe(options.sessionAdapter);
    expect(module.get(LEDGER_DB_ADAPTER)).toBe(options.ledgerAdapter);
  });

  it('should start a session from a template saved through the module', async () => {
    module = await Test.createTestingModule({
      imports: [ShipmentSessionModule.forRoot(createModuleOptions())],
    }).compile();
    await module.init();

    await module.get(TemplateService).save('u1', 'Home', {
      fromName: 'John Smith',
      fromAddress: '123 Main St',
      fromCity: 'New York',
      fromState: 'NY',
      fromZip: '10001',
      toName: 'Jane Doe',
      toAddress: '456 Oak Ave',
      toCity: 'Los Angeles',
      toState: 'CA',
      toZip: '90001',
    });
    const prompt = await module
      .get(WorkflowController)
      .startFromTemplate('u1', 'Home');

    expect(prompt.step).toBe('PARCEL_WEIGHT');
  });

  it('should work with forRootAsync', async () => {
    const useFactory = jest.fn(() =>
      createModuleOptions({ sessionTtlSeconds: 60 }),
    );
    module = await Test.createTestingModule({
      imports: [ShipmentSessionModule.forRootAsync({ useFactory })],
    }).compile();

    await module.init();

    expect(useFactory).toHaveBeenCalledTimes(1);
    expect(module.get(SessionStore)).toBeInstanceOf(SessionStore);
  });

  it('should register the sweep job unless disabled', async () => {
    module = await Test.createTestingModule({
      imports: [
        ShipmentSessionModule.forRoot(
          createModuleOptions({ enableSessionSweep: true }),
        ),
      ],
    }).compile();

    await module.init();

    const schedulerRegistry = module.get(SchedulerRegistry);
    expect(schedulerRegistry.doesExist('cron', SESSION_SWEEP_JOB)).toBe(true);
  });

  it('should credit a top-up through the wired module', async () => {
    const ledgerAdapter = new InMemoryLedgerAdapter();
    module = await Test.createTestingModule({
      imports: [
        ShipmentSessionModule.forRoot(createModuleOptions({ ledgerAdapter })),
      ],
    }).compile();
    await module.init();

    const checkout = module.get(CheckoutService);
    const coordinator = module.get(PaymentCompletionCoordinator);

    const invoice = await checkout.createTopUp('u1', 25);
    const outcome = await coordinator.apply({
      externalReference: invoice.externalReference,
      status: 'paid',
      amount: 25,
    });

    expect(outcome).toBe('applied');
    expect(await ledgerAdapter.getBalance('u1')).toBe(25);
    expect(
      await coordinator.apply({
        externalReference: 'missing',
        status: 'paid',
        amount: 10,
      }),
    ).toBe('rejected');
  });

  it('should reject invalid options at bootstrap', async () => {
    await expect(
      Test.createTestingModule({
        imports: [
          ShipmentSessionModule.forRoot(
            createModuleOptions({ lockTimeoutMs: 0 }),
          ),
        ],
      }).compile(),
    ).rejects.toThrow('lockTimeoutMs must be a positive number, got 0');
  });
});

describe('resolveSessionOptions', () => {
  it('should apply defaults', () => {
    const options = createModuleOptions();
    delete options.enableSessionSweep;

    expect(resolveSessionOptions(options)).toEqual({
      sessionTableName: 'shipment_sessions',
      sessionTtlSeconds: 900,
      quoteTtlSeconds: 3600,
      lockTimeoutMs: 10_000,
      sweepCronExpression: '*/60 * * * * *',
      enableSessionSweep: true,
    });
  });

  it('should reject an unsafe table name', () => {
    expect(() =>
      resolveSessionOptions(
        createModuleOptions({ sessionTableName: 'sessions; drop table x' }),
      ),
    ).toThrow();
  });

  it('should reject a non-positive quote lifetime', () => {
    expect(() =>
      resolveSessionOptions(createModuleOptions({ quoteTtlSeconds: -5 })),
    ).toThrow('quoteTtlSeconds must be a positive number, got -5');
  });
});
