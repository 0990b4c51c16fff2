/**
 * Property-Based Tests for @ledgerlens/ratios
 *
 * 1. Integer arithmetic matches JavaScript arithmetic
 * 2. Floored modulo takes the sign of the divisor and stays below it
 * 3. Any input either evaluates to a finite number or throws ExpressionError
 * 4. Cumulative levels only ever add ratios
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { evaluateExpression } from "../src/expression.js";
import { computeRatios } from "../src/ratios.js";
import { ExpressionError } from "../src/types.js";
import type { RatioDefinition } from "@ledgerlens/types";

// =============================================================================
// Arbitraries
// =============================================================================

const arbInt = fc.integer({ min: -10_000, max: 10_000 });
const arbNonZero = arbInt.filter((n) => n !== 0);

const arbLevel = fc.constantFrom("basic", "advanced", "full");

const arbDefinitions = fc.array(
  fc.record({
    key: fc.stringMatching(/^[a-z]{1,6}$/),
    formula: fc.constantFrom("a + b", "a / b", "a", "missing"),
    level: arbLevel,
  }),
  { maxLength: 12 },
);

// =============================================================================
// Properties
// =============================================================================

describe("expression properties", () => {
  it("adds, subtracts and multiplies like JavaScript", () => {
    fc.assert(
      fc.property(arbInt, arbInt, arbInt, (a, b, c) => {
        expect(evaluateExpression("a + b * c", { a, b, c })).toBe(a + b * c);
        expect(evaluateExpression("(a - b) * c", { a, b, c })).toBe((a - b) * c);
      }),
    );
  });

  it("floored modulo follows the sign of the divisor", () => {
    fc.assert(
      fc.property(arbInt, arbNonZero, (a, b) => {
        const result = evaluateExpression("a % b", { a, b });
        expect(Math.abs(result)).toBeLessThan(Math.abs(b));
        if (result !== 0) {
          expect(result > 0).toBe(b > 0);
        }
        expect(Math.abs((a - result) % b)).toBe(0);
      }),
    );
  });

  it("never fails with anything but ExpressionError", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 20 }), (source) => {
        try {
          expect(Number.isFinite(evaluateExpression(source, { x: 1 }))).toBe(true);
        } catch (err) {
          expect(err).toBeInstanceOf(ExpressionError);
        }
      }),
    );
  });
});

describe("ratio level properties", () => {
  it("a higher level includes every ratio of a lower one", () => {
    fc.assert(
      fc.property(arbDefinitions, (raw) => {
        const definitions: RatioDefinition[] = raw.map((d) => ({
          ...d,
          label: d.key,
          unit: "ratio",
          notes: "",
        }));
        const measures = { a: 6, b: 3 };
        const basic = computeRatios(measures, definitions, "basic");
        const advanced = computeRatios(measures, definitions, "advanced");
        const full = computeRatios(measures, definitions, "full");

        expect(advanced.slice(0, basic.length)).toEqual(basic);
        expect(full.slice(0, advanced.length)).toEqual(advanced);
        expect(full).toHaveLength(definitions.length);
      }),
    );
  });
});
