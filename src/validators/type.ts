import type { NamedNode } from "@rdfjs/types";
import { Graph } from "../graph.js";
import { ValidationResult } from "../results.js";
import { PropertyShape } from "../shapes.js";
import { ConstraintComponent, Term } from "../terms.js";
import { buildViolation, getPropertyValues, isInstanceOf } from "./helpers.js";

function hasDatatype(term: Term, datatype: NamedNode): boolean {
    return term.termType === "Literal" && term.datatype.value === datatype.value;
}

/**
 * Checks `datatype` and `class`: one result per offending value, datatype
 * results first.
 */
export function validateType(graph: Graph, focusNode: Term, shape: PropertyShape): ValidationResult[] {
    const { datatype, class: classIri } = shape;
    if (datatype === undefined && classIri === undefined) {
        return [];
    }

    const values = getPropertyValues(graph, focusNode, shape);
    const results: ValidationResult[] = [];

    if (datatype !== undefined) {
        for (const value of values) {
            if (!hasDatatype(value, datatype)) {
                results.push(buildViolation(
                    focusNode,
                    shape,
                    `Value does not have required datatype <${datatype.value}>`,
                    ConstraintComponent.Datatype,
                    [["expectedDatatype", datatype], ["actualValue", value]]
                ));
            }
        }
    }

    if (classIri !== undefined) {
        for (const value of values) {
            if (!isInstanceOf(graph, value, classIri)) {
                results.push(buildViolation(
                    focusNode,
                    shape,
                    `Value is not an instance of class <${classIri.value}>`,
                    ConstraintComponent.Class,
                    [["expectedClass", classIri], ["actualValue", value]]
                ));
            }
        }
    }

    return results;
}
