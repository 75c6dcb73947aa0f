import { describe, test, expect } from '@jest/globals';
import { DatasetQueryExecutor } from '../src/datasetQueryExecutor.js';
import { run } from '../src/engine.js';
import { QueryError } from '../src/errors.js';
import { Graph, graphFromTurtle } from '../src/graph.js';
import { Severity } from '../src/results.js';
import { defineNodeShape } from '../src/shapes.js';
import { Term, toSparqlTerm } from '../src/terms.js';
import { detailTerm, EX, ex, PREFIXES } from './resources/helpers.js';

const modules = graphFromTurtle(`${PREFIXES}
    ex:m1 a ex:Module ; ex:name "core" ; ex:label "Kern"@de ; ex:size 3 .
    ex:m2 a ex:Module ; ex:name "core" .
    ex:m3 a ex:Module ; ex:name "util" .
`);

const SPARQL_PREFIX = `PREFIX ex: <${EX}>\n`;

describe('DatasetQueryExecutor', () => {
    test('execute: answers SELECT queries from the data graph', async () => {
        const executor = new DatasetQueryExecutor();
        const rows = await executor.execute(modules, `${SPARQL_PREFIX}SELECT ?m ?name WHERE { ?m ex:name ?name } ORDER BY ?m`);

        expect(rows.map((row) => [row.get("m")?.value, row.get("name")?.value])).toEqual([
            ["http://example.org/m1", "core"],
            ["http://example.org/m2", "core"],
            ["http://example.org/m3", "util"],
        ]);
        expect(toSparqlTerm(rows[0].get("name") ?? ex("missing"))).toBe('"core"');
    });

    test('execute: keeps language tags and datatypes', async () => {
        const executor = new DatasetQueryExecutor();
        const [row] = await executor.execute(modules, `${SPARQL_PREFIX}SELECT ?label ?size WHERE { ex:m1 ex:label ?label ; ex:size ?size }`);

        const terms = ["label", "size"].map((name) => {
            const term: Term | undefined = row.get(name);
            return term ? toSparqlTerm(term) : undefined;
        });
        expect(terms).toEqual(['"Kern"@de', '"3"^^<http://www.w3.org/2001/XMLSchema#integer>']);
    });

    test('execute: unbound variables are left out of the row', async () => {
        const executor = new DatasetQueryExecutor();
        const rows = await executor.execute(
            modules,
            `${SPARQL_PREFIX}SELECT ?m ?label WHERE { ?m a ex:Module OPTIONAL { ?m ex:label ?label } } ORDER BY ?m`
        );

        expect(rows).toHaveLength(3);
        expect(rows[0].has("label")).toBe(true);
        expect([...rows[1].keys()]).toEqual(["m"]);
    });

    test('execute: triples in named graphs are visible', async () => {
        const graph = graphFromTurtle(`${PREFIXES}
            ex:g1 { ex:m9 a ex:Module . }
        `);
        const executor = new DatasetQueryExecutor();
        const rows = await executor.execute(graph, `${SPARQL_PREFIX}SELECT ?m WHERE { ?m a ex:Module }`);
        expect(rows.map((row) => row.get("m")?.value)).toEqual(["http://example.org/m9"]);
    });

    test('execute: ASK and CONSTRUCT queries are rejected', async () => {
        const executor = new DatasetQueryExecutor();
        await expect(executor.execute(modules, "ASK { ?s ?p ?o }")).rejects.toThrow(QueryError);
        await expect(executor.execute(modules, "ASK { ?s ?p ?o }")).rejects.toThrow("Rule queries must be SELECT queries");
        await expect(executor.execute(modules, "CONSTRUCT { ?s ?p ?o } WHERE { ?s ?p ?o }"))
            .rejects.toThrow("Rule queries must be SELECT queries");
    });

    test('execute: a malformed query becomes a QueryError', async () => {
        const executor = new DatasetQueryExecutor();
        await expect(executor.execute(modules, "SELECT WHERE {")).rejects.toThrow(QueryError);
        await expect(executor.execute(modules, "SELECT WHERE {")).rejects.toThrow("Query evaluation failed");
    });

    test('execute: an aborted signal stops the query', async () => {
        const executor = new DatasetQueryExecutor();
        const controller = new AbortController();
        controller.abort(new Error("stopped"));
        await expect(executor.execute(modules, "SELECT ?s WHERE { ?s ?p ?o }", controller.signal)).rejects.toThrow("stopped");
    });

    test('execute: graphs without a dataset cannot be queried', async () => {
        const bare: Graph = {
            getValues: () => [],
            hasTriple: () => false,
            getSubjects: () => [],
        };
        const executor = new DatasetQueryExecutor();
        await expect(executor.execute(bare, "SELECT ?s WHERE { ?s ?p ?o }")).rejects.toThrow("In-memory queries need a DatasetGraph");
    });
});

describe('run with in-memory rule queries', () => {
    const uniqueName = defineNodeShape({
        id: ex("UniqueNameShape"),
        targetClasses: [ex("Module")],
        ruleConstraints: [{
            queryTemplate: "SELECT $this ?other WHERE { $this ex:name ?name . ?other ex:name ?name . FILTER(?other != $this) }",
            message: "Module name is not unique",
            prefixes: { ex: EX },
        }],
    });

    test('run: rule queries see the real triples, in both modes', async () => {
        const executor = new DatasetQueryExecutor();

        for (const parallel of [false, true]) {
            const report = await run(modules, [uniqueName], { queryExecutor: executor, parallel });

            expect(report.results.map((r) => [r.focusNode.value, r.severity, r.message])).toEqual([
                ["http://example.org/m1", Severity.Violation, "Module name is not unique"],
                ["http://example.org/m2", Severity.Violation, "Module name is not unique"],
            ]);
            expect(detailTerm(report.results[0], "this")).toBe("<http://example.org/m1>");
            expect(detailTerm(report.results[0], "other")).toBe("<http://example.org/m2>");
            expect(detailTerm(report.results[1], "other")).toBe("<http://example.org/m1>");
            expect(report.status).toBe("violates");
        }
    });
});
