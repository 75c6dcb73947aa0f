import type { BlankNode, Literal, NamedNode } from "@rdfjs/types";
import { DataFactory } from "n3";

export const XSD = "http://www.w3.org/2001/XMLSchema#";
export const RDF = "http://www.w3.org/1999/02/22-rdf-syntax-ns#";
export const SH = "http://www.w3.org/ns/shacl#";

/**
 * A value that can appear in a data graph: an IRI, a blank node or a literal.
 */
export type Term = NamedNode | BlankNode | Literal;

/**
 * Shapes are identified by an IRI or, for anonymous shapes, a blank node.
 */
export type ShapeId = NamedNode | BlankNode;

export const { namedNode, blankNode, literal } = DataFactory;

export const RDF_TYPE = namedNode(`${RDF}type`);
export const XSD_STRING = namedNode(`${XSD}string`);

/**
 * SHACL constraint component IRIs reported with each built-in result
 */
export const ConstraintComponent = {
    MinCount: namedNode(`${SH}MinCountConstraintComponent`),
    MaxCount: namedNode(`${SH}MaxCountConstraintComponent`),
    Datatype: namedNode(`${SH}DatatypeConstraintComponent`),
    Class: namedNode(`${SH}ClassConstraintComponent`),
    Pattern: namedNode(`${SH}PatternConstraintComponent`),
    MinLength: namedNode(`${SH}MinLengthConstraintComponent`),
    In: namedNode(`${SH}InConstraintComponent`),
    HasValue: namedNode(`${SH}HasValueConstraintComponent`),
    MaxInclusive: namedNode(`${SH}MaxInclusiveConstraintComponent`),
    QualifiedMinCount: namedNode(`${SH}QualifiedMinCountConstraintComponent`),
    Sparql: namedNode(`${SH}SPARQLConstraintComponent`),
} as const;

export function isTerm(value: unknown): value is Term {
    if (typeof value !== "object" || value === null || !("termType" in value)) {
        return false;
    }
    const { termType } = value;
    return termType === "NamedNode" || termType === "BlankNode" || termType === "Literal";
}

export function isNamedNode(value: unknown): value is NamedNode {
    return isTerm(value) && value.termType === "NamedNode";
}

/**
 * Structural equality: IRIs by string, blank nodes by label, literals by
 * lexical form, datatype IRI and language tag. Lexical forms are compared
 * as they are ("1" and "01" differ even when both are xsd:integer).
 */
export function termEquals(a: Term, b: Term): boolean {
    if (a.termType !== b.termType || a.value !== b.value) {
        return false;
    }
    if (a.termType === "Literal" && b.termType === "Literal") {
        return a.language === b.language && a.datatype.value === b.datatype.value;
    }
    return true;
}

export function containsTerm(terms: readonly Term[], term: Term): boolean {
    return terms.some((candidate) => termEquals(candidate, term));
}

/**
 * Removes repeated terms, keeping the first occurrence of each
 */
export function uniqueTerms(terms: Iterable<Term>): Term[] {
    const seen = new Set<string>();
    const unique: Term[] = [];
    for (const term of terms) {
        // the SPARQL form is unique per term
        const key = toSparqlTerm(term);
        if (!seen.has(key)) {
            seen.add(key);
            unique.push(term);
        }
    }
    return unique;
}

function escapeSparqlString(value: string): string {
    return value
        .replace(/\\/g, "\\\\")
        .replace(/"/g, '\\"')
        .replace(/\n/g, "\\n")
        .replace(/\r/g, "\\r")
        .replace(/\t/g, "\\t");
}

/**
 * Serializes a term the way it is written inside a SPARQL query:
 * `<iri>`, `_:label`, `"lexical"@lang` or `"lexical"^^<datatype>`.
 */
export function toSparqlTerm(term: Term): string {
    switch (term.termType) {
        case "NamedNode":
            return `<${term.value}>`;
        case "BlankNode":
            return `_:${term.value}`;
        case "Literal": {
            const lexical = `"${escapeSparqlString(term.value)}"`;
            if (term.language) {
                return `${lexical}@${term.language}`;
            }
            if (term.datatype.value === XSD_STRING.value) {
                return lexical;
            }
            return `${lexical}^^<${term.datatype.value}>`;
        }
    }
}

