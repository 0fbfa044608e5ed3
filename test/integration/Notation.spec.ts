import { analyze, evaluateAnalysis, evaluateExpression, extractVariables, substituteVariables } from "../../src/Notation.js";
import { convertToPostfix } from "../../src/converter/ShuntingYard.js";
import { convertToPrefix } from "../../src/converter/Polish.js";
import { evaluateAst } from "../../src/evaluator/AstEvaluator.js";
import { evaluatePostfix } from "../../src/evaluator/PostfixEvaluator.js";
import { parse } from "../../src/parser/Parser.js";
import { expectErr, expectOk } from "../TestUtils.js";

describe("GIVEN expressions with variables", () => {
    describe("WHEN extracting variables", () => {
        test("THEN a single variable should be found", () => {
            expect(expectOk(extractVariables("A + 1"))).toEqual(["A"]);
        });

        test("THEN duplicates should appear once", () => {
            expect(expectOk(extractVariables("A + A * B"))).toEqual(["A", "B"]);
        });

        test("THEN names should be sorted", () => {
            expect(expectOk(extractVariables("Z + A + M"))).toEqual(["A", "M", "Z"]);
            expect(expectOk(extractVariables("(A + B) * C ^ D - E"))).toEqual(["A", "B", "C", "D", "E"]);
        });

        test("THEN case should be kept as typed", () => {
            expect(expectOk(extractVariables("b + a + B"))).toEqual(["B", "a", "b"]);
        });

        test("THEN number-only expressions should have none", () => {
            expect(expectOk(extractVariables("1 + 2 * 3"))).toEqual([]);
        });

        test("THEN lexer errors should be reported", () => {
            expect(expectErr(extractVariables("A # B"))).toMatchObject({ kind: "LexError", text: "#", position: 2 });
        });

        test("THEN repeated calls should give the same frozen names", () => {
            const first = expectOk(extractVariables("Q * R + Q"));
            const second = expectOk(extractVariables("Q * R + Q"));
            expect(second).toEqual(["Q", "R"]);
            expect(second).toBe(first);
            expect(Object.isFrozen(first)).toBe(true);
        });
    });

    describe("WHEN evaluating infix expressions", () => {
        const expectations: [string, Record<string, number>, number][] = [
            ["A + B", { A: 1, B: 2 }, 3],
            ["A + B * C", { A: 1, B: 2, C: 3 }, 7],
            ["(A + B) * C", { A: 1, B: 2, C: 3 }, 9],
            ["A ^ B", { A: 2, B: 3 }, 8],
            ["(A + B) * C ^ D - E", { A: 1, B: 2, C: 2, D: 3, E: 5 }, 19],
            ["2 + 3 * 4", {}, 14],
            ["A / B + C", { A: 10, B: 2, C: 3 }, 8],
        ];

        for (const [infix, vars, result] of expectations) {
            test(`THEN '${infix}' should yield ${result}`, () => {
                expect(expectOk(evaluateExpression(infix, vars))).toEqual(result);
            });
        }

        test("THEN a single missing variable should be listed", () => {
            expect(expectErr(evaluateExpression("A+B+C", { A: 1, B: 2 }))).toMatchObject({
                kind: "MissingVariablesError",
                variables: ["C"],
            });
        });

        test("THEN all missing variables should be listed at once", () => {
            const error = expectErr(evaluateExpression("A + D + B + C", { A: 1, B: 2 }));
            expect(error).toMatchObject({ kind: "MissingVariablesError", variables: ["C", "D"] });
            expect(error.message).toEqual("Missing values for variables: C, D");
        });

        test("THEN evaluation errors should be passed through", () => {
            expect(expectErr(evaluateExpression("A / (B - 2)", { A: 1, B: 2 }))).toMatchObject({ kind: "DivisionByZeroError" });
        });
    });
});

describe("GIVEN the reference expressions", () => {
    test("THEN the mixed expression should convert to postfix", () => {
        expect(expectOk(convertToPostfix("(A + B) * C ^ D - E"))).toEqual("A B + C D ^ * E -");
    });

    test("THEN the long expression should convert to prefix", () => {
        expect(expectOk(convertToPrefix("A + B * (C ^ D - E) ^ (F + G * H) - I"))).toEqual("- + A * B ^ - ^ C D E + F * G H I");
    });

    test("THEN the postfix form should evaluate", () => {
        expect(expectOk(evaluatePostfix("A B + C D ^ * E -", { A: 1, B: 2, C: 2, D: 3, E: 5 }))).toEqual(19);
    });
});

describe("GIVEN complete variable bindings", () => {
    const vars = { A: 2, B: 3, C: 1.5, D: 2, E: 0.5, F: 1, G: 2, H: 0.25, I: 7 };
    const inputs = [
        "A + B * C",
        "(A + B) * C ^ D - E",
        "A / B / C",
        "A ^ B ^ C",
        "A - (B - C) * 2.5",
        "A + B * (C ^ D - E) ^ (F + G * H) - I",
        "((A)) * (B + (C))",
    ];

    for (const input of inputs) {
        test(`THEN the postfix and tree evaluations of '${input}' should agree`, () => {
            const viaPostfix = expectOk(evaluatePostfix(expectOk(convertToPostfix(input)), vars));
            const viaTree = expectOk(evaluateAst(expectOk(parse(input)), vars));
            expect(viaPostfix).toEqual(viaTree);
        });
    }
});

describe("GIVEN an expression to analyze", () => {
    describe("WHEN it is a plain expression", () => {
        const analysis = expectOk(analyze("A + B * C"));

        test("THEN all representations should be present", () => {
            expect(analysis).toEqual({
                expression: "A + B * C",
                target: undefined,
                variables: ["A", "B", "C"],
                postfix: "A B C * +",
                prefix: "+ A * B C",
                triples: [
                    { operator: "*", arg1: "B", arg2: "C" },
                    { operator: "+", arg1: "A", arg2: "(1)" },
                ],
                quadruples: [
                    { operator: "*", arg1: "B", arg2: "C", result: "T1" },
                    { operator: "+", arg1: "A", arg2: "T1", result: "T2" },
                ],
            });
        });

        test("THEN it should evaluate with bindings", () => {
            expect(expectOk(evaluateAnalysis(analysis, { A: 1, B: 2, C: 3 }))).toEqual(7);
        });

        test("THEN missing bindings should be listed", () => {
            expect(expectErr(evaluateAnalysis(analysis, { B: 2 }))).toMatchObject({
                kind: "MissingVariablesError",
                variables: ["A", "C"],
            });
        });
    });

    describe("WHEN it is an assignment", () => {
        const analysis = expectOk(analyze("X = A * B + C"));

        test("THEN the conversions should be done on the assigned value", () => {
            expect(analysis.target).toEqual("X");
            expect(analysis.variables).toEqual(["A", "B", "C"]);
            expect(analysis.postfix).toEqual("A B * C +");
            expect(analysis.prefix).toEqual("+ * A B C");
            expect(analysis.triples).toEqual([
                { operator: "*", arg1: "A", arg2: "B" },
                { operator: "+", arg1: "(1)", arg2: "C" },
            ]);
            expect(analysis.quadruples).toEqual([
                { operator: "*", arg1: "A", arg2: "B", result: "T1" },
                { operator: "+", arg1: "T1", arg2: "C", result: "T2" },
            ]);
        });

        test("THEN the target should not need a value", () => {
            expect(expectOk(evaluateAnalysis(analysis, { A: 2, B: 3, C: 4 }))).toEqual(10);
        });
    });

    describe("WHEN an assignment has very small or very large literals", () => {
        test("THEN the postfix form should keep them as written and evaluate", () => {
            const small = expectOk(analyze("X = 0.0000001 + A"));
            expect(small.postfix).toEqual("0.0000001 A +");
            expect(expectOk(evaluateAnalysis(small, { A: 1 }))).toBeCloseTo(1.0000001, 12);

            const large = expectOk(analyze("X = A * 1000000000000000000000"));
            expect(large.postfix).toEqual("A 1000000000000000000000 *");
            expect(expectOk(evaluateAnalysis(large, { A: 2 }))).toEqual(2e21);
        });

        test("THEN a literal beyond double precision should keep its digits", () => {
            const analysis = expectOk(analyze("Y = 12345678901234567891 - B"));
            expect(analysis.postfix).toEqual("12345678901234567891 B -");
            expect(analysis.prefix).toEqual("- 12345678901234567891 B");
            expect(analysis.quadruples).toEqual([
                { operator: "-", arg1: "12345678901234567891", arg2: "B", result: "T1" },
            ]);
        });
    });

    describe("WHEN it is a chained assignment", () => {
        test("THEN it should be rejected", () => {
            expect(expectErr(analyze("X = Y = A"))).toMatchObject({ kind: "UnsupportedNodeError" });
        });
    });

    describe("WHEN it is not valid", () => {
        test("THEN parser errors should be reported", () => {
            expect(expectErr(analyze("A + (B"))).toMatchObject({ kind: "MissingClosingParenError", position: 4 });
        });
    });
});

describe("GIVEN a postfix form and bindings", () => {
    test("THEN bound variables should be replaced by their values", () => {
        expect(substituteVariables("A B + C D ^ * E -", { A: 1, B: 2, C: 2, D: 3, E: 5 })).toEqual("1 2 + 2 3 ^ * 5 -");
    });

    test("THEN whole tokens only should be replaced", () => {
        expect(substituteVariables("AB A +", { A: 1.5 })).toEqual("AB 1.5 +");
    });

    test("THEN unbound variables and literals should stay", () => {
        expect(substituteVariables("A 2.50 * Q -", { A: 4 })).toEqual("4 2.50 * Q -");
    });
});
