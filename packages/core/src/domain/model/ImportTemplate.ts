/** Stored import definition. Read-only to the import engine. */
export interface ImportTemplate {
  readonly id: number;
  readonly name?: string;
  /** Tab whose table receives the rows. The table name is resolved through the catalog. */
  readonly tabId: number;
  /**
   * Comma-separated header definition. When set, the file carries no header
   * line and its first non-blank line is already data.
   */
  readonly headerCsv: string | null;
  /** Default client for inserted rows and bulk updates. `0` when unset. */
  readonly clientId: number;
  /** Default organization for inserted rows. `0` when unset. */
  readonly orgId: number;
}

/** Return the template header definition, or `null` when the file header must be used. */
export function templateHeader(template: ImportTemplate): string | null {
  return template.headerCsv !== null && template.headerCsv.trim() !== '' ? template.headerCsv : null;
}
