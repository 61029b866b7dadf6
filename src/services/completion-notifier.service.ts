import { Inject, Injectable, Logger } from '@nestjs/common';
import type {
  CompletionNotice,
  CompletionTrigger,
} from '../interfaces/collaborators.interface';
import { COMPLETION_TRIGGER } from '../session.constants';

/**
 * Calls the completion trigger. A failing trigger is logged and never undoes
 * the payment that caused it.
 */
@Injectable()
export class CompletionNotifier {
  private readonly logger = new Logger(CompletionNotifier.name);

  constructor(
    @Inject(COMPLETION_TRIGGER) private readonly trigger: CompletionTrigger,
  ) {}

  async notify(notice: CompletionNotice): Promise<boolean> {
    try {
      await this.trigger.onPaymentCompleted(notice);
      return true;
    } catch (error) {
      this.logger.error(
        `Completion trigger failed for ${notice.reference} (user ${notice.userKey})`,
        error instanceof Error ? error.stack : error,
      );
      return false;
    }
  }
}
