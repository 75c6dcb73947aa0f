import type { NamedNode } from "@rdfjs/types";
import { Graph } from "../../src/graph.js";
import { BindingRow, QueryExecutor } from "../../src/queryExecutor.js";
import { ValidationResult } from "../../src/results.js";
import { isTerm, namedNode, toSparqlTerm } from "../../src/terms.js";

export const EX = "http://example.org/";

export const PREFIXES = `
    @prefix ex: <http://example.org/> .
    @prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .
    @prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
    @prefix xsd: <http://www.w3.org/2001/XMLSchema#> .
`;

export function ex(local: string): NamedNode {
    return namedNode(`${EX}${local}`);
}

/**
 * SPARQL form of a term-valued detail, so assertions can compare strings
 */
export function detailTerm(result: ValidationResult, key: string): string {
    const value = result.details.get(key);
    if (!isTerm(value)) {
        throw new Error(`Detail ${key} is not a term`);
    }
    return toSparqlTerm(value);
}

export type QueryHandler = (query: string, signal?: AbortSignal) => Promise<BindingRow[]>;

/**
 * Records every query it receives and answers through `handler`
 */
export class StubExecutor implements QueryExecutor {
    queries: string[] = [];
    private handler: QueryHandler;

    constructor(handler: QueryHandler = async () => []) {
        this.handler = handler;
    }

    execute(_graph: Graph, query: string, signal?: AbortSignal): Promise<BindingRow[]> {
        this.queries.push(query);
        return this.handler(query, signal);
    }
}
