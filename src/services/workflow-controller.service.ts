import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  TEMPLATE_ENTRY_STEP,
  type StepId,
} from '../definitions/shipment-steps';
import { StepMachine } from '../engines/step-machine.engine';
import { InsufficientBalanceError } from '../errors/insufficient-balance.error';
import { InvalidSessionRecordError } from '../errors/invalid-session-record.error';
import { QuoteFetchError } from '../errors/quote-fetch.error';
import { SessionExpiredError } from '../errors/session-expired.error';
import { ValidationError } from '../errors/validation.error';
import { SessionEventType } from '../events/session-event-type.enum';
import type {
  SessionCancelledEvent,
  SessionTransitionEvent,
} from '../events/session-events';
import type { PromptDescriptor } from '../interfaces/prompt-descriptor.interface';
import type { Quote } from '../interfaces/collaborators.interface';
import type {
  Session,
  ShipmentFieldKey,
  ShipmentFields,
} from '../interfaces/session-records.interface';
import type { StepAcceptance } from '../interfaces/step-graph.interface';
import { STEP_MACHINE } from '../session.constants';
import { CheckoutService } from './checkout.service';
import { QuoteService, toShipmentDescriptor } from './quote.service';
import { SessionStore } from './session-store.service';
import { TemplateService } from './template.service';
import { UserLockRegistry } from './user-lock-registry.service';

type PromptExtras = Pick<PromptDescriptor, 'error' | 'signal'>;

/**
 * Drives a user's session through the step graph. Every operation runs
 * under the user's lock, so inputs from one user are evaluated one at a time
 * against the latest stored fields.
 */
@Injectable()
export class WorkflowController {
  private readonly logger = new Logger(WorkflowController.name);

  constructor(
    private readonly store: SessionStore,
    private readonly locks: UserLockRegistry,
    private readonly quoteService: QuoteService,
    private readonly checkout: CheckoutService,
    private readonly templates: TemplateService,
    @Inject(STEP_MACHINE) private readonly machine: StepMachine,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /** Starts a new order, discarding any session in progress. */
  async start(userKey: string): Promise<PromptDescriptor> {
    return this.locks.withLock(userKey, async () => {
      const session = await this.store.restart(userKey);
      return this.prompt(session);
    });
  }

  async advance(userKey: string, rawInput: string): Promise<PromptDescriptor> {
    return this.locks.withLock(userKey, async () => {
      const session = await this.loadSession(userKey);
      if (!session || this.machine.isFinal(session.currentStep)) {
        return this.reinitialize(userKey);
      }

      const node = this.machine.getNode(session.currentStep);
      if (!node.parse) {
        return this.reinitialize(userKey);
      }

      let acceptance: StepAcceptance<ShipmentFieldKey>;
      try {
        acceptance = node.parse(rawInput, session.fields);
      } catch (error) {
        if (error instanceof ValidationError) {
          return this.prompt(session, { error: error.message });
        }
        throw error;
      }

      const toStep = this.machine.transition(
        session.currentStep,
        acceptance.edge,
      );
      return this.enterStep(session, acceptance.edge, toStep, acceptance.patch);
    });
  }

  async cancel(userKey: string): Promise<PromptDescriptor> {
    return this.locks.withLock(userKey, async () => {
      const session = await this.loadSession(userKey);
      await this.store.clear(userKey);

      this.logger.log(`Session for user ${userKey} cancelled`);
      this.eventEmitter.emit(SessionEventType.CANCELLED, {
        userKey,
        step: session?.currentStep ?? null,
        timestamp: new Date(),
      } satisfies SessionCancelledEvent);

      return {
        userKey,
        step: 'CANCELLED',
        promptKey: this.machine.getNode('CANCELLED').promptKey,
        orderCorrelationId: session?.orderCorrelationId ?? null,
        actions: [],
        signal: 'cancelled',
      };
    });
  }

  /** Returns the user to the predecessor of the current step. */
  async rollback(userKey: string, message: string): Promise<PromptDescriptor> {
    return this.locks.withLock(userKey, async () => {
      const session = await this.loadSession(userKey);
      if (!session || this.machine.isFinal(session.currentStep)) {
        return this.reinitialize(userKey);
      }
      return this.rollbackFrom(session, message);
    });
  }

  async refreshQuotes(userKey: string): Promise<PromptDescriptor> {
    return this.locks.withLock(userKey, async () => {
      const session = await this.loadSession(userKey);
      if (!session || this.machine.isFinal(session.currentStep)) {
        return this.reinitialize(userKey);
      }

      if (this.machine.getNode(session.currentStep).entry !== 'load-quotes') {
        return this.prompt(session, {
          error: 'Carrier rates can only be refreshed while choosing a carrier',
        });
      }
      return this.loadQuotes(session, true);
    });
  }

  /**
   * Saves the session's sender and recipient under `name`. The session stays
   * where it is; a refused save is reported on the current prompt.
   */
  async saveTemplate(userKey: string, name: string): Promise<PromptDescriptor> {
    return this.locks.withLock(userKey, async () => {
      const session = await this.loadSession(userKey);
      if (!session || this.machine.isFinal(session.currentStep)) {
        return this.reinitialize(userKey);
      }

      try {
        await this.templates.save(userKey, name, session.fields);
      } catch (error) {
        if (error instanceof ValidationError) {
          return this.prompt(session, { error: error.message });
        }
        throw error;
      }
      return this.prompt(session);
    });
  }

  /**
   * Starts a new order with both addresses taken from the named template,
   * entering at the parcel weight. An unknown name starts a blank order.
   */
  async startFromTemplate(
    userKey: string,
    name: string,
  ): Promise<PromptDescriptor> {
    return this.locks.withLock(userKey, async () => {
      const template = await this.templates.get(userKey, name);
      if (!template) {
        const session = await this.store.restart(userKey);
        return this.prompt(session, {
          error: `Template "${name.trim()}" not found`,
        });
      }

      const session = await this.store.restart(
        userKey,
        template.fields,
        TEMPLATE_ENTRY_STEP,
      );
      return this.prompt(session);
    });
  }

  /** Prompt for the user's current step, or null without a live session. */
  async current(userKey: string): Promise<PromptDescriptor | null> {
    const session = await this.loadSession(userKey);
    return session ? this.prompt(session) : null;
  }

  private async enterStep(
    session: Session,
    edge: string,
    toStep: StepId,
    patch: ShipmentFields,
  ): Promise<PromptDescriptor> {
    const updated = await this.store.updateAtomic(session.userKey, {
      step: toStep,
      patch,
    });
    if (!updated) {
      return this.reinitialize(session.userKey);
    }

    this.eventEmitter.emit(SessionEventType.TRANSITION, {
      userKey: updated.userKey,
      orderCorrelationId: updated.orderCorrelationId,
      fromStep: session.currentStep,
      toStep,
      edge,
      fieldKeys: Object.keys(patch),
      timestamp: new Date(),
    } satisfies SessionTransitionEvent);

    switch (this.machine.getNode(toStep).entry) {
      case 'load-quotes':
        return this.loadQuotes(updated, edge === 'refresh');
      case 'checkout':
        return this.runCheckout(updated);
      default:
        return this.prompt(updated);
    }
  }

  private async loadQuotes(
    session: Session,
    refresh: boolean,
  ): Promise<PromptDescriptor> {
    const descriptor = toShipmentDescriptor(session.fields);
    if (!descriptor) {
      return this.rollbackFrom(
        session,
        'Shipment details are incomplete. Please review them',
      );
    }

    let quotes: Quote[];
    try {
      quotes = await this.quoteService.getQuotes(descriptor, { refresh });
    } catch (error) {
      if (error instanceof QuoteFetchError) {
        return this.rollbackFrom(session, error.message);
      }
      throw error;
    }

    const updated = await this.store.updateAtomic(session.userKey, {
      patch: { quotes },
    });
    if (!updated) {
      return this.reinitialize(session.userKey);
    }
    return this.prompt(updated);
  }

  private async runCheckout(session: Session): Promise<PromptDescriptor> {
    const { selectedQuote, paymentMethod } = session.fields;
    if (!selectedQuote || !paymentMethod) {
      return this.rollbackFrom(
        session,
        'Choose a carrier and a payment method first',
      );
    }

    try {
      const result =
        paymentMethod === 'balance'
          ? await this.checkout.payFromBalance(session, selectedQuote)
          : await this.checkout.payByInvoice(session, selectedQuote);

      return {
        userKey: session.userKey,
        step: session.currentStep,
        promptKey: this.machine.getNode(session.currentStep).promptKey,
        orderCorrelationId: session.orderCorrelationId,
        actions: [],
        signal: 'completed',
        checkout: result,
      };
    } catch (error) {
      if (error instanceof InsufficientBalanceError) {
        return this.rollbackFrom(session, error.message);
      }
      this.logger.error(
        `Checkout failed for order ${session.orderCorrelationId}`,
        error instanceof Error ? error.stack : error,
      );
      return this.rollbackFrom(
        session,
        'Payment could not be created. Please try again',
      );
    }
  }

  private async rollbackFrom(
    session: Session,
    message: string,
  ): Promise<PromptDescriptor> {
    const rolledBack = await this.store.rollback(
      session.userKey,
      session.currentStep,
      message,
    );
    if (!rolledBack) {
      return this.reinitialize(session.userKey);
    }
    return this.prompt(rolledBack, { error: message });
  }

  /** An unreadable stored session is treated like an expired one. */
  private async loadSession(userKey: string): Promise<Session | null> {
    try {
      return await this.store.get(userKey);
    } catch (error) {
      if (error instanceof InvalidSessionRecordError) {
        this.logger.warn(error.message);
        return null;
      }
      throw error;
    }
  }

  private async reinitialize(userKey: string): Promise<PromptDescriptor> {
    const expired = new SessionExpiredError(userKey);
    this.logger.warn(expired.message);

    const session = await this.store.restart(userKey);
    return this.prompt(session, { signal: 'restart', error: expired.message });
  }

  private prompt(session: Session, extras: PromptExtras = {}): PromptDescriptor {
    const node = this.machine.getNode(session.currentStep);
    const descriptor: PromptDescriptor = {
      userKey: session.userKey,
      step: session.currentStep,
      promptKey: node.promptKey,
      orderCorrelationId: session.orderCorrelationId,
      actions: this.machine.edgesFrom(session.currentStep),
      ...extras,
    };

    if (node.entry === 'load-quotes' && session.fields.quotes) {
      descriptor.quotes = session.fields.quotes;
    }
    return descriptor;
  }
}
