/** Base class for the structural failures that abort a pair-report run. */
export class PairReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** One or more required columns are absent from the input table. */
export class SchemaError extends PairReportError {
  readonly missingColumns: readonly string[];

  constructor(missingColumns: readonly string[]) {
    super(`Missing required columns: ${missingColumns.map((c) => `"${c}"`).join(", ")}`);
    this.missingColumns = missingColumns;
  }
}

/** A column a template depends on is not in the table being arranged. */
export class ColumnError extends PairReportError {
  readonly column: string;
  readonly template: string;

  constructor(column: string, template: string, role: "anchor" | "insert") {
    super(
      role === "anchor"
        ? `Anchor column "${column}" not found while applying ${template} column order`
        : `Column "${column}" not found while applying ${template} column order`,
    );
    this.column = column;
    this.template = template;
  }
}

/** The delimited input could not be read as a header-plus-rows table. */
export class TableParseError extends PairReportError {
  readonly row: number | null;

  constructor(message: string, row: number | null = null) {
    super(row != null ? `${message} (row ${row})` : message);
    this.row = row;
  }
}

/** Command-line flags or prompted answers failed validation. */
export class InvalidOptionsError extends PairReportError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.issues = issues;
  }
}
