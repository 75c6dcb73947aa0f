import { Graph } from "../graph.js";
import { ValidationResult } from "../results.js";
import { PropertyShape } from "../shapes.js";
import { ConstraintComponent, Term } from "../terms.js";
import { buildViolation, getPropertyValues } from "./helpers.js";

/**
 * Checks `minCount` and `maxCount` against the number of values on the
 * shape's path. Each bound yields at most one result.
 */
export function validateCardinality(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    if (shape.minCount === undefined && shape.maxCount === undefined) {
        return [];
    }

    const count = getPropertyValues(graph, focusNode, shape).length;
    const results: ValidationResult[] = [];

    if (shape.minCount !== undefined && count < shape.minCount) {
        results.push(buildViolation(
            focusNode,
            shape,
            `Property has too few values (expected at least ${shape.minCount}, found ${count})`,
            ConstraintComponent.MinCount,
            [["actualCount", count], ["minCount", shape.minCount]]
        ));
    }

    if (shape.maxCount !== undefined && count > shape.maxCount) {
        results.push(buildViolation(
            focusNode,
            shape,
            `Property has too many values (expected at most ${shape.maxCount}, found ${count})`,
            ConstraintComponent.MaxCount,
            [["actualCount", count], ["maxCount", shape.maxCount]]
        ));
    }

    return results;
}
