import { Graph } from "../graph.js";
import { QueryExecutor } from "../queryExecutor.js";
import { Severity, ValidationResult } from "../results.js";
import { RuleConstraint } from "../shapes.js";
import { ConstraintComponent, Term, toSparqlTerm } from "../terms.js";

const DEFAULT_RULE_MESSAGE = "Rule constraint violated";

/**
 * Binds a rule's query template to a focus node.
 *
 * Every `$this` becomes the focus node's SPARQL form. A projected
 * `SELECT $this` is rewritten to `SELECT ?this`, and for IRI focus nodes
 * `?this` is bound at the start of the query pattern (the first `{` after
 * the projection, `WHERE` being optional), since a constant cannot be
 * projected. Declared prefixes are prepended.
 */
export function bindQuery(rule: RuleConstraint, focusNode: Term): string {
    const focus = toSparqlTerm(focusNode);
    const projectsThis = /SELECT\s+(DISTINCT\s+|REDUCED\s+)?\$this\b/i.test(rule.queryTemplate);

    let query = rule.queryTemplate;
    if (projectsThis) {
        query = query.replace(/(SELECT\s+(?:DISTINCT\s+|REDUCED\s+)?)\$this\b/i, "$1?this");
    }
    query = query.split("$this").join(focus);
    if (projectsThis && focusNode.termType === "NamedNode") {
        query = query.replace(
            /(SELECT\s+(?:DISTINCT\s+|REDUCED\s+)?\?this\b[^{]*?)(WHERE\s*)?\{/i,
            (_match: string, head: string, where: string | undefined) => `${head}${where ?? ""}{ BIND(${focus} AS ?this) .`
        );
    }

    const prefixes = Object.entries(rule.prefixes ?? {})
        .map(([prefix, iri]) => `PREFIX ${prefix}: <${iri}>`)
        .join("\n");
    return prefixes ? `${prefixes}\n${query}` : query;
}

async function validateRule(
    graph: Graph,
    focusNode: Term,
    rule: RuleConstraint,
    executor: QueryExecutor,
    signal?: AbortSignal
): Promise<ValidationResult[]> {
    const rows = await executor.execute(graph, bindQuery(rule, focusNode), signal);
    return rows.map((row) => ({
        focusNode,
        sourceShape: rule.sourceShapeId,
        severity: Severity.Violation,
        message: rule.message ?? DEFAULT_RULE_MESSAGE,
        details: new Map(row),
        sourceConstraintComponent: ConstraintComponent.Sparql,
    }));
}

/**
 * Evaluates a node shape's rule constraints for one focus node, in order.
 * Each returned row is one violation. Query failures are not caught here:
 * they reject the returned promise.
 */
export async function validateRules(
    graph: Graph,
    focusNode: Term,
    rules: readonly RuleConstraint[],
    executor: QueryExecutor,
    signal?: AbortSignal
): Promise<ValidationResult[]> {
    const results: ValidationResult[] = [];
    for (const rule of rules) {
        signal?.throwIfAborted();
        results.push(...await validateRule(graph, focusNode, rule, executor, signal));
    }
    return results;
}
