import { Writer } from "n3";
import { Store as OxigraphStore } from "oxigraph";
import { errorMessage, QueryError } from "./errors.js";
import { DatasetGraph, Graph } from "./graph.js";
import { BindingRow, QueryExecutor } from "./queryExecutor.js";
import { blankNode, isTerm, literal, namedNode, Term } from "./terms.js";

function toTerm(term: Term): Term {
    switch (term.termType) {
        case "NamedNode":
            return namedNode(term.value);
        case "BlankNode":
            return blankNode(term.value);
        case "Literal":
            return term.language ? literal(term.value, term.language) : literal(term.value, namedNode(term.datatype.value));
    }
}

// SELECT yields an array of Maps; ASK a boolean and CONSTRUCT an array of quads
function toBindingRows(result: unknown): BindingRow[] {
    if (!Array.isArray(result)) {
        throw new QueryError("Rule queries must be SELECT queries");
    }
    const solutions: unknown[] = result;
    return solutions.map((solution) => {
        if (!(solution instanceof Map)) {
            throw new QueryError("Rule queries must be SELECT queries");
        }
        const entries: Iterable<[unknown, unknown]> = solution;
        const row = new Map<string, Term>();
        for (const [name, value] of entries) {
            if (typeof name === "string" && isTerm(value)) {
                row.set(name, toTerm(value));
            }
        }
        return row;
    });
}

/**
 * Executes rule queries against the data graph itself, with an in-process
 * SPARQL engine. Named graphs are visible through the default graph.
 *
 * Each graph is copied into a query store on first use and the copy is
 * reused afterwards, so a graph must not change between runs.
 */
export class DatasetQueryExecutor implements QueryExecutor {
    private stores = new WeakMap<DatasetGraph, OxigraphStore>();

    async execute(graph: Graph, query: string, signal?: AbortSignal): Promise<BindingRow[]> {
        if (!(graph instanceof DatasetGraph)) {
            throw new QueryError("In-memory queries need a DatasetGraph");
        }
        signal?.throwIfAborted();

        let result: unknown;
        try {
            result = this.storeFor(graph).query(query, { use_default_graph_as_union: true });
        } catch (err) {
            throw new QueryError(`Query evaluation failed: ${errorMessage(err)}, Query: ${query}`, undefined, { cause: err });
        }
        return toBindingRows(result);
    }

    private storeFor(graph: DatasetGraph): OxigraphStore {
        let store = this.stores.get(graph);
        if (!store) {
            store = new OxigraphStore();
            const nquads = new Writer({ format: "N-Quads" }).quadsToString([...graph.dataset]);
            store.load(nquads, { format: "application/n-quads" });
            this.stores.set(graph, store);
        }
        return store;
    }
}
