import type { NamedNode } from "@rdfjs/types";
import { Graph } from "../graph.js";
import { DetailValue, Severity, ValidationResult } from "../results.js";
import { PropertyShape } from "../shapes.js";
import { RDF_TYPE, Term } from "../terms.js";

/**
 * Signature shared by all per-property validators. Validators are pure:
 * they only read the graph and return `[]` when their constraints are absent.
 */
export type PropertyValidator = (graph: Graph, focusNode: Term, shape: PropertyShape) => ValidationResult[];

const NUMERIC_LEXICAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function getPropertyValues(graph: Graph, focusNode: Term, shape: PropertyShape): Term[] {
    return graph.getValues(focusNode, shape.path);
}

/**
 * Explicit `rdf:type` membership only, no subclass reasoning. Literals are
 * never instances of anything.
 */
export function isInstanceOf(graph: Graph, term: Term, classIri: NamedNode): boolean {
    if (term.termType === "Literal") {
        return false;
    }
    return graph.hasTriple(term, RDF_TYPE, classIri);
}

/**
 * Reads a literal's lexical form as a number. Decimal and scientific
 * notation plus INF/-INF are accepted; anything else (NaN included) is
 * not a number.
 */
export function parseNumericLexical(lexical: string): number | undefined {
    const trimmed = lexical.trim();
    if (trimmed === "INF" || trimmed === "+INF") return Infinity;
    if (trimmed === "-INF") return -Infinity;
    if (!NUMERIC_LEXICAL.test(trimmed)) {
        return undefined;
    }
    return Number(trimmed);
}

export function buildViolation(
    focusNode: Term,
    shape: PropertyShape,
    defaultMessage: string,
    component: NamedNode,
    details: Array<[string, DetailValue]>
): ValidationResult {
    return {
        focusNode,
        path: shape.path,
        sourceShape: shape.id,
        severity: Severity.Violation,
        message: shape.message ?? defaultMessage,
        details: new Map(details),
        sourceConstraintComponent: component,
    };
}
