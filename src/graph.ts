import fs from "node:fs/promises";
import type { DatasetCore, Quad } from "@rdfjs/types";
import { Parser, Store } from "n3";
import { errorMessage } from "./errors.js";
import { isTerm, Term } from "./terms.js";

/**
 * Read-only view of a data graph. Implementations must be safe to read from
 * several validation units at once; the engine never writes to a graph.
 */
export interface Graph {
    /** objects of all triples `(subject, predicate, ?o)` */
    getValues(subject: Term, predicate: Term): Term[];
    hasTriple(subject: Term, predicate: Term, object: Term): boolean;
    /** subjects of all triples `(?s, predicate, object)` */
    getSubjects(predicate: Term, object: Term): Term[];
}

/**
 * Graph backed by any RDF/JS dataset (an n3 `Store`, for instance). Triples
 * are matched across all named graphs of the dataset.
 */
export class DatasetGraph implements Graph {
    readonly dataset: DatasetCore<Quad, Quad>;

    constructor(dataset: DatasetCore<Quad, Quad>) {
        this.dataset = dataset;
    }

    getValues(subject: Term, predicate: Term): Term[] {
        // literals are never subjects
        if (subject.termType === "Literal") {
            return [];
        }
        const values: Term[] = [];
        for (const quad of this.dataset.match(subject, predicate, null, null)) {
            if (isTerm(quad.object)) {
                values.push(quad.object);
            }
        }
        return values;
    }

    hasTriple(subject: Term, predicate: Term, object: Term): boolean {
        if (subject.termType === "Literal") {
            return false;
        }
        return this.dataset.match(subject, predicate, object, null).size > 0;
    }

    getSubjects(predicate: Term, object: Term): Term[] {
        const subjects: Term[] = [];
        for (const quad of this.dataset.match(null, predicate, object, null)) {
            if (isTerm(quad.subject)) {
                subjects.push(quad.subject);
            }
        }
        return subjects;
    }
}

export function parseTurtle(turtle: string, baseIRI?: string): Store {
    const parser = new Parser({ baseIRI });
    return new Store(parser.parse(turtle));
}

export function graphFromTurtle(turtle: string, baseIRI?: string): DatasetGraph {
    return new DatasetGraph(parseTurtle(turtle, baseIRI));
}

export async function loadTurtleFile(filePath: string): Promise<DatasetGraph> {
    let content: string;
    try {
        content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
        throw new Error(`Failed to read data graph from ${filePath}: ${errorMessage(err)}`);
    }
    return graphFromTurtle(content, `file://${filePath.replace(/\\/g, "/")}`);
}
