// errors.ts

/**
 * - table: aborts one sheet, siblings continue
 * - cell: one value is stored as NULL, the row continues
 * - file: one workbook is skipped, other files continue
 */
export type ErrorScope = "table" | "cell" | "file";

export class SheetforgeError extends Error {
  readonly scope: ErrorScope;

  constructor(message: string, scope: ErrorScope, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.scope = scope;
  }
}

export class ReservedColumnError extends SheetforgeError {
  constructor(readonly column: string) {
    super(`column name '${column}' is reserved by the system`, "table");
  }
}

export class DuplicateColumnError extends SheetforgeError {
  constructor(readonly column: string) {
    super(`column '${column}' is declared more than once`, "table");
  }
}

export class SheetLayoutError extends SheetforgeError {
  constructor(readonly sheet: string, message: string) {
    super(`sheet ${sheet}: ${message}`, "table");
  }
}

export class RelationSheetError extends SheetforgeError {
  constructor(message: string) {
    super(message, "table");
  }
}

/** Raised by a value parser; carries no row */
export class ValueParseError extends SheetforgeError {
  constructor(
    readonly column: string,
    readonly value: string,
    reason: string
  ) {
    super(`column ${column}: ${reason}`, "cell");
  }
}

export class CellParseError extends SheetforgeError {
  constructor(
    readonly table: string,
    readonly column: string,
    readonly rowNumber: number,
    readonly value: string,
    cause: ValueParseError
  ) {
    super(`${table} row ${rowNumber}: ${cause.message}`, "cell", { cause });
  }
}

export class WorkbookReadError extends SheetforgeError {
  constructor(readonly file: string, cause: unknown) {
    super(
      `failed to open workbook ${file}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      "file",
      { cause }
    );
  }
}

/** A failure tied to the sheet or file it came from */
export interface SourceError {
  source: string;
  sheet?: string;
  error: Error;
}
