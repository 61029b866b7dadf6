export const RAW_SESSION_MODULE_OPTIONS = Symbol('RAW_SESSION_MODULE_OPTIONS');
export const SESSION_MODULE_OPTIONS = Symbol('SESSION_MODULE_OPTIONS');
export const SESSION_DB_ADAPTER = Symbol('SESSION_DB_ADAPTER');
export const LEDGER_DB_ADAPTER = Symbol('LEDGER_DB_ADAPTER');
export const ARCHIVE_STRATEGY = Symbol('ARCHIVE_STRATEGY');
export const STEP_MACHINE = Symbol('STEP_MACHINE');
export const RATE_PROVIDER = Symbol('RATE_PROVIDER');
export const PAYMENT_PROVIDER = Symbol('PAYMENT_PROVIDER');
export const COMPLETION_TRIGGER = Symbol('COMPLETION_TRIGGER');

export const DEFAULT_SESSION_TABLE = 'shipment_sessions';
export const DEFAULT_SESSION_TTL_SECONDS = 900;
export const DEFAULT_QUOTE_TTL_SECONDS = 3600;
export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
export const DEFAULT_SWEEP_CRON_EXPRESSION = '*/60 * * * * *';
export const DEFAULT_ARCHIVE_LIST_LIMIT = 10;
export const MAX_TEMPLATES_PER_USER = 10;
export const TEMPLATE_NAME_MAX_LENGTH = 30;

export const SESSION_SWEEP_JOB = 'shipment-session-sweep';
