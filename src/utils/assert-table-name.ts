const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Table names are interpolated into SQL, so only identifiers are accepted. */
export function assertTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}

export function archiveTableName(tableName: string): string {
  const archiveTable = `${tableName}_archive`;
  assertTableName(archiveTable);
  return archiveTable;
}

export function templateTableName(tableName: string): string {
  const templateTable = `${tableName}_templates`;
  assertTableName(templateTable);
  return templateTable;
}
