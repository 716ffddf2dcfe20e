/**
 * Diagnostic types for methodcheck
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Marker conflicts (SIG1001-SIG1099)
  | "SIG1001" // Second method-type marker
  | "SIG1002" // Auxiliary option specified more than once
  | "SIG1003" // Method-type marker on a module function
  // Missing designation (SIG2001-SIG2099)
  | "SIG2001" // Receiver-less method without static designation
  // Structural shape errors (SIG3001-SIG3099)
  | "SIG3001" // Unexpected receiver
  | "SIG3002" // Expected receiver
  | "SIG3003" // Arguments not allowed for this method type
  | "SIG3004" // Setter takes exactly one value argument
  | "SIG3005" // Class method without type object argument
  | "SIG3006" // pass-module without module argument
  // Unsupported forms (SIG4001-SIG4099)
  | "SIG4001" // Generic type parameters
  | "SIG4002" // Opaque-existential parameter type
  // Option applicability (SIG5001-SIG5099)
  | "SIG5001" // Signature text on a constructor
  | "SIG5002" // Signature text on a property-style member
  | "SIG5003" // Name override on a constructor
  | "SIG5004" // pass-module outside a module function
  // Batch loading errors (SIG9001-SIG9006)
  | "SIG9001" // Batch file not found
  | "SIG9002" // Failed to read batch file
  | "SIG9003" // Invalid JSON in batch file
  | "SIG9004" // Batch file must be an object
  | "SIG9005" // Missing or invalid 'declarations' field
  | "SIG9006"; // Invalid declaration entry

export type DiagnosticCategory =
  | "conflict"
  | "missingDesignation"
  | "structuralShape"
  | "unsupportedForm"
  | "optionApplicability"
  | "input";

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
  readonly relatedLocations?: readonly SourceLocation[];
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string,
  relatedLocations?: readonly SourceLocation[]
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
  relatedLocations,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

const CATEGORY_BY_PREFIX: Readonly<Record<string, DiagnosticCategory>> = {
  SIG1: "conflict",
  SIG2: "missingDesignation",
  SIG3: "structuralShape",
  SIG4: "unsupportedForm",
  SIG5: "optionApplicability",
  SIG9: "input",
};

export const diagnosticCategory = (code: DiagnosticCode): DiagnosticCategory =>
  CATEGORY_BY_PREFIX[code.slice(0, 4)] ?? "input";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

const compareLocations = (
  a: SourceLocation | undefined,
  b: SourceLocation | undefined
): number => {
  // Diagnostics without a location sort after anchored ones
  if (!a || !b) {
    return (a ? 0 : 1) - (b ? 0 : 1);
  }
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  return a.line - b.line || a.column - b.column;
};

/**
 * Stable sort into source order by primary location.
 * Diagnostics sharing a location keep their relative order.
 */
export const sortDiagnostics = (
  diagnostics: readonly Diagnostic[]
): readonly Diagnostic[] =>
  diagnostics
    .map((diagnostic, index) => ({ diagnostic, index }))
    .sort(
      (a, b) =>
        compareLocations(a.diagnostic.location, b.diagnostic.location) ||
        a.index - b.index
    )
    .map((entry) => entry.diagnostic);

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (): DiagnosticsCollector => ({
  diagnostics: [],
  hasErrors: false,
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const addDiagnostics = (
  collector: DiagnosticsCollector,
  diagnostics: readonly Diagnostic[]
): DiagnosticsCollector => diagnostics.reduce(addDiagnostic, collector);
