import { Graph } from "../graph.js";
import { ValidationResult } from "../results.js";
import { PropertyShape } from "../shapes.js";
import { ConstraintComponent, Term } from "../terms.js";
import { buildViolation, getPropertyValues, isInstanceOf } from "./helpers.js";

/**
 * Counts only the values typed with `qualifiedClass` and requires at least
 * `qualifiedMinCount` of them. Does nothing unless both are set.
 */
export function validateQualified(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const { qualifiedClass, qualifiedMinCount } = shape;
    if (qualifiedClass === undefined || qualifiedMinCount === undefined) {
        return [];
    }

    const values = getPropertyValues(graph, focusNode, shape);
    const qualifiedCount = values.filter((value) => isInstanceOf(graph, value, qualifiedClass)).length;
    if (qualifiedCount >= qualifiedMinCount) {
        return [];
    }

    return [buildViolation(
        focusNode,
        shape,
        `Property has too few values of required type (expected at least ${qualifiedMinCount} instances of <${qualifiedClass.value}>, found ${qualifiedCount})`,
        ConstraintComponent.QualifiedMinCount,
        [
            ["qualifiedCount", qualifiedCount],
            ["qualifiedMinCount", qualifiedMinCount],
            ["qualifiedClass", qualifiedClass],
            ["totalValues", values.length],
        ]
    )];
}
