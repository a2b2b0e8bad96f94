import type { TableKind } from "@/lib/domain/types";

// A required column is absent from an input table. Fatal.
export class SchemaError extends Error {
  readonly table: TableKind;
  readonly missing: string[];

  constructor(table: TableKind, missing: string[]) {
    super(`${table} table is missing required column(s): ${missing.join(", ")}`);
    this.name = "SchemaError";
    this.table = table;
    this.missing = missing;
  }
}

// An input file path does not exist. Fatal, raised before parsing.
export class SourceNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Input file not found: ${path}`);
    this.name = "SourceNotFoundError";
    this.path = path;
  }
}

export function isFatalInputError(err: unknown): err is SchemaError | SourceNotFoundError {
  return err instanceof SchemaError || err instanceof SourceNotFoundError;
}
