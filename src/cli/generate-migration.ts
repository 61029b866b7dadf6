#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_LEDGER_TABLE_PREFIX } from '../adapters/pg-ledger.adapter';
import { DEFAULT_SESSION_TABLE } from '../session.constants';
import {
  archiveTableName,
  assertTableName,
  templateTableName,
} from '../utils/assert-table-name';

export function generateMigration(
  sessionTable: string = DEFAULT_SESSION_TABLE,
  ledgerPrefix: string = DEFAULT_LEDGER_TABLE_PREFIX,
): string {
  assertTableName(sessionTable);
  assertTableName(ledgerPrefix);
  const archiveTable = archiveTableName(sessionTable);
  const templateTable = templateTableName(sessionTable);
  const payments = `${ledgerPrefix}_payments`;
  const orders = `${ledgerPrefix}_orders`;
  const balances = `${ledgerPrefix}_balances`;

  return `-- migrate:up
CREATE TABLE ${sessionTable} (
    user_key TEXT PRIMARY KEY,
    order_correlation_id TEXT NOT NULL,
    current_step TEXT NOT NULL,
    fields JSONB NOT NULL DEFAULT '{}'::jsonb,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    last_touched_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${sessionTable}_last_touched_at
    ON ${sessionTable} (last_touched_at);

CREATE TABLE ${archiveTable} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    user_key TEXT NOT NULL,
    order_correlation_id TEXT NOT NULL,
    payload JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${archiveTable}_user_key_created_at
    ON ${archiveTable} (user_key, created_at DESC);

CREATE TABLE ${templateTable} (
    user_key TEXT NOT NULL,
    name TEXT NOT NULL,
    fields JSONB NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (user_key, name)
);

CREATE TABLE ${orders} (
    order_correlation_id TEXT PRIMARY KEY,
    user_key TEXT NOT NULL,
    fields JSONB NOT NULL,
    quote JSONB NOT NULL,
    amount NUMERIC(12, 2) NOT NULL,
    payment_status TEXT NOT NULL CHECK (payment_status IN ('unpaid', 'paid')),
    payment_method TEXT NOT NULL CHECK (payment_method IN ('balance', 'invoice')),
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${orders}_user_key
    ON ${orders} (user_key);

CREATE TABLE ${payments} (
    external_reference TEXT PRIMARY KEY,
    user_key TEXT NOT NULL,
    requested_amount NUMERIC(12, 2) NOT NULL,
    paid_amount NUMERIC(12, 2),
    status TEXT NOT NULL CHECK (status IN ('pending', 'paid', 'failed', 'expired')),
    kind TEXT NOT NULL CHECK (kind IN ('balance-topup', 'order-payment')),
    order_correlation_id TEXT REFERENCES ${orders}(order_correlation_id),
    created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${payments}_user_key
    ON ${payments} (user_key);

CREATE TABLE ${balances} (
    user_key TEXT PRIMARY KEY,
    balance NUMERIC(12, 2) NOT NULL DEFAULT 0 CHECK (balance >= 0),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

-- migrate:down
DROP TABLE IF EXISTS ${balances};
DROP TABLE IF EXISTS ${payments};
DROP TABLE IF EXISTS ${orders};
DROP TABLE IF EXISTS ${templateTable};
DROP TABLE IF EXISTS ${archiveTable};
DROP TABLE IF EXISTS ${sessionTable};
`;
}

const USAGE = 'Usage: shipment-session generate-migration [sessionTable] [ledgerPrefix]';

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      `${USAGE}\n\n` +
        'Generates a dbmate-compatible SQL migration for the session, archive, template and ledger tables.\n\n' +
        'Arguments:\n' +
        `  sessionTable    Live session table (default: ${DEFAULT_SESSION_TABLE})\n` +
        `  ledgerPrefix    Prefix of the payments, orders and balances tables (default: ${DEFAULT_LEDGER_TABLE_PREFIX})\n\n` +
        'Example:\n' +
        '  npx shipment-session generate-migration shipment_sessions shipment_ledger',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const sessionTable = args[1] ?? DEFAULT_SESSION_TABLE;
  const ledgerPrefix = args[2] ?? DEFAULT_LEDGER_TABLE_PREFIX;

  let sql: string;
  try {
    sql = generateMigration(sessionTable, ledgerPrefix);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exit(1);
  }

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${sessionTable}.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
