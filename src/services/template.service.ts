import { Inject, Injectable, Logger } from '@nestjs/common';
import { ValidationError } from '../errors/validation.error';
import type { ISessionDbAdapter } from '../interfaces/session-db-adapter.interface';
import type { ResolvedSessionOptions } from '../interfaces/session-module-options.interface';
import type {
  ShipmentFields,
  ShipmentTemplate,
  TemplateFields,
  TemplateRecord,
} from '../interfaces/session-records.interface';
import {
  MAX_TEMPLATES_PER_USER,
  SESSION_DB_ADAPTER,
  SESSION_MODULE_OPTIONS,
  TEMPLATE_NAME_MAX_LENGTH,
} from '../session.constants';
import { parseShipmentFields, toPatchRecord } from '../utils/hydrate-session';

const REQUIRED_TEMPLATE_KEYS = [
  'fromName',
  'fromAddress',
  'fromCity',
  'fromState',
  'fromZip',
  'toName',
  'toAddress',
  'toCity',
  'toState',
  'toZip',
] as const;

const OPTIONAL_TEMPLATE_KEYS = [
  'fromAddress2',
  'fromPhone',
  'toAddress2',
  'toPhone',
] as const;

/** Trimmed and cut to the maximum length; empty names yield null. */
export function normalizeTemplateName(raw: string): string | null {
  const name = raw.trim().slice(0, TEMPLATE_NAME_MAX_LENGTH).trim();
  return name === '' ? null : name;
}

function selectTemplateFields(fields: ShipmentFields): TemplateFields {
  const selected: TemplateFields = {};
  for (const key of REQUIRED_TEMPLATE_KEYS) {
    const value = fields[key];
    if (value !== undefined) selected[key] = value;
  }
  for (const key of OPTIONAL_TEMPLATE_KEYS) {
    const value = fields[key];
    if (value !== undefined) selected[key] = value;
  }
  return selected;
}

/**
 * Named sender/recipient pairs a user can reuse. A session started from a
 * template skips address entry.
 */
@Injectable()
export class TemplateService {
  private readonly logger = new Logger(TemplateService.name);

  constructor(
    @Inject(SESSION_DB_ADAPTER) private readonly adapter: ISessionDbAdapter,
    @Inject(SESSION_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedSessionOptions, 'sessionTableName'>,
  ) {}

  /**
   * Stores the address fields of `fields` under `rawName`, replacing a
   * template of the same name. Both addresses must be complete.
   */
  async save(
    userKey: string,
    rawName: string,
    fields: ShipmentFields,
  ): Promise<ShipmentTemplate> {
    const name = normalizeTemplateName(rawName);
    if (!name) {
      throw new ValidationError('templateName', 'Template name must not be empty');
    }

    const missing = REQUIRED_TEMPLATE_KEYS.find((key) => fields[key] === undefined);
    if (missing) {
      throw new ValidationError(
        missing,
        'Enter both addresses before saving a template',
      );
    }

    const record = await this.adapter.saveTemplate(
      this.options.sessionTableName,
      { userKey, name, fields: toPatchRecord(selectTemplateFields(fields)) },
      MAX_TEMPLATES_PER_USER,
    );
    if (!record) {
      throw new ValidationError(
        'templateName',
        `You can keep at most ${MAX_TEMPLATES_PER_USER} templates. Delete one first`,
      );
    }

    this.logger.log(`Template "${name}" saved for user ${userKey}`);
    return this.toTemplate(record);
  }

  /** Ordered by name. */
  async list(userKey: string): Promise<ShipmentTemplate[]> {
    const records = await this.adapter.findTemplates(
      this.options.sessionTableName,
      userKey,
    );
    return records.map((record) => this.toTemplate(record));
  }

  async get(userKey: string, rawName: string): Promise<ShipmentTemplate | null> {
    const name = normalizeTemplateName(rawName);
    if (!name) return null;

    const record = await this.adapter.findTemplate(
      this.options.sessionTableName,
      userKey,
      name,
    );
    return record ? this.toTemplate(record) : null;
  }

  async delete(userKey: string, rawName: string): Promise<boolean> {
    const name = normalizeTemplateName(rawName);
    if (!name) return false;

    const deleted = await this.adapter.deleteTemplate(
      this.options.sessionTableName,
      userKey,
      name,
    );
    if (deleted) {
      this.logger.log(`Template "${name}" deleted for user ${userKey}`);
    }
    return deleted;
  }

  private toTemplate(record: TemplateRecord): ShipmentTemplate {
    return {
      userKey: record.userKey,
      name: record.name,
      fields: selectTemplateFields(
        parseShipmentFields(record.userKey, record.fields),
      ),
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
    };
  }
}
