import type { NamedNode } from "@rdfjs/types";
import { ShapeId, Term } from "./terms.js";

export enum Severity {
    Violation = "Violation",
    Warning = "Warning",
    Info = "Info",
    // the unit could not be evaluated; never counts against conformance
    EngineError = "EngineError",
}

export type DetailValue = Term | readonly Term[] | string | number | boolean;

export type ResultDetails = ReadonlyMap<string, DetailValue>;

export interface ValidationResult {
    readonly focusNode: Term;
    /** absent for node-level results (rule constraints, engine errors) */
    readonly path?: NamedNode;
    readonly sourceShape: ShapeId;
    readonly severity: Severity;
    readonly message: string;
    readonly details: ResultDetails;
    readonly sourceConstraintComponent?: NamedNode;
}

export type ReportStatus = "conforms" | "violates" | "inconclusive";

export class ValidationReport {
    readonly results: readonly ValidationResult[];

    constructor(results: readonly ValidationResult[]) {
        this.results = Object.freeze([...results]);
    }

    get conforms(): boolean {
        return !this.results.some((r) => r.severity === Severity.Violation);
    }

    get violations(): ValidationResult[] {
        return this.withSeverity(Severity.Violation);
    }

    get engineErrors(): ValidationResult[] {
        return this.withSeverity(Severity.EngineError);
    }

    /**
     * False when at least one unit could not be evaluated. A report that
     * conforms but is not complete only covers part of the data.
     */
    get complete(): boolean {
        return !this.results.some((r) => r.severity === Severity.EngineError);
    }

    get status(): ReportStatus {
        if (!this.conforms) {
            return "violates";
        }
        return this.complete ? "conforms" : "inconclusive";
    }

    withSeverity(severity: Severity): ValidationResult[] {
        return this.results.filter((r) => r.severity === severity);
    }
}
