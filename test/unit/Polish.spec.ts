import { astToPostfix, astToPrefix, convertToPrefix } from "../../src/converter/Polish.js";
import { convertToPostfix } from "../../src/converter/ShuntingYard.js";
import { parse } from "../../src/parser/Parser.js";
import { NodeType, type Node } from "../../src/parser/nodes/Node.js";
import { expectErr, expectOk } from "../TestUtils.js";

describe("GIVEN an infix expression", () => {
    const expectations: [string, string][] = [
        ["A + B", "+ A B"],
        ["A ^ B ^ C", "^ A ^ B C"],
        ["A + B * C", "+ A * B C"],
        ["(A + B) * C", "* + A B C"],
        ["A - B - C", "- - A B C"],
        ["A + B * (C ^ D - E) ^ (F + G * H) - I", "- + A * B ^ - ^ C D E + F * G H I"],
        ["2.0 * 3 + 0.25", "+ * 2.0 3 0.25"],
        ["A + 0.0000001", "+ A 0.0000001"],
        ["A + 12345678901234567891", "+ A 12345678901234567891"],
        ["A + 1000000000000000000000", "+ A 1000000000000000000000"],
        ["2.50 * A", "* 2.50 A"],
    ];

    for (const [infix, prefix] of expectations) {
        describe(`WHEN converting '${infix}' to prefix`, () => {
            test(`THEN it should yield '${prefix}'`, () => {
                expect(expectOk(convertToPrefix(infix))).toEqual(prefix);
            });
        });
    }

    describe("WHEN adding redundant parentheses", () => {
        test("THEN the prefix form should not change", () => {
            expect(expectOk(convertToPrefix("(A) + ((B * C))"))).toEqual("+ A * B C");
        });
    });
});

describe("GIVEN a parsed tree", () => {
    const inputs = [
        "A + B",
        "(A + B) * C ^ D - E",
        "A + B * (C ^ D - E) ^ (F + G * H) - I",
        "A ^ B ^ C / 2",
        "0.0000001 * A + 12345678901234567891",
        "2.50 - 1000000000000000000000",
    ];

    for (const input of inputs) {
        test(`THEN postfix from the tree of '${input}' should match the shunting-yard output`, () => {
            const ast = expectOk(parse(input));
            expect(expectOk(astToPostfix(ast))).toEqual(expectOk(convertToPostfix(input)));
        });
    }
});

describe("GIVEN nodes without polish form", () => {
    test("THEN an assignment should be rejected", () => {
        const error = expectErr(convertToPrefix("X = A + B"));
        expect(error).toMatchObject({ kind: "UnsupportedNodeError" });
        expect(error.message).toEqual("Cannot convert Assignment(Identifier(X), BinaryOp(Identifier(A), '+', Identifier(B)))");
    });

    test("THEN a nested unary operator should be rejected", () => {
        const negated: Node = {
            type: NodeType.UnaryOp,
            operator: "-",
            operand: { type: NodeType.Identifier, name: "A" },
        };
        const tree: Node = {
            type: NodeType.BinaryOp,
            operator: "+",
            left: negated,
            right: { type: NodeType.Identifier, name: "B" },
        };

        expect(expectErr(astToPrefix(tree))).toMatchObject({ kind: "UnsupportedNodeError", node: negated });
        expect(expectErr(astToPostfix(tree))).toMatchObject({ kind: "UnsupportedNodeError", node: negated });
    });
});
