import { describe, test, expect } from '@jest/globals';
import { Severity, ValidationReport, ValidationResult } from '../src/results.js';
import { ex } from './resources/helpers.js';

function result(severity: Severity, focus: string = "n1"): ValidationResult {
    return {
        focusNode: ex(focus),
        sourceShape: ex("Shape"),
        severity,
        message: `${severity} for ${focus}`,
        details: new Map(),
    };
}

describe('ValidationReport', () => {
    test('ValidationReport: no results conforms', () => {
        const report = new ValidationReport([]);
        expect(report.conforms).toBe(true);
        expect(report.complete).toBe(true);
        expect(report.status).toBe("conforms");
    });

    test('ValidationReport: warnings and info do not affect conformance', () => {
        const report = new ValidationReport([result(Severity.Warning), result(Severity.Info)]);
        expect(report.conforms).toBe(true);
        expect(report.status).toBe("conforms");
    });

    test('ValidationReport: any violation means the data violates', () => {
        const report = new ValidationReport([result(Severity.Violation), result(Severity.EngineError, "n2")]);
        expect(report.conforms).toBe(false);
        expect(report.complete).toBe(false);
        expect(report.status).toBe("violates");
    });

    test('ValidationReport: engine errors alone make the report inconclusive', () => {
        const report = new ValidationReport([result(Severity.Warning), result(Severity.EngineError, "n2")]);
        expect(report.conforms).toBe(true);
        expect(report.complete).toBe(false);
        expect(report.status).toBe("inconclusive");
    });

    test('ValidationReport: filters results by severity', () => {
        const report = new ValidationReport([
            result(Severity.Violation, "n1"),
            result(Severity.EngineError, "n2"),
            result(Severity.Violation, "n3"),
            result(Severity.Info, "n4"),
        ]);
        expect(report.violations.map((r) => r.message)).toEqual(["Violation for n1", "Violation for n3"]);
        expect(report.engineErrors.map((r) => r.message)).toEqual(["EngineError for n2"]);
        expect(report.withSeverity(Severity.Info).map((r) => r.message)).toEqual(["Info for n4"]);
    });

    test('ValidationReport: results cannot change after construction', () => {
        const results = [result(Severity.Violation)];
        const report = new ValidationReport(results);
        results.push(result(Severity.Violation, "n2"));

        expect(report.results).toHaveLength(1);
        expect(Object.isFrozen(report.results)).toBe(true);
    });
});
