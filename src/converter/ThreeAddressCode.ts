/*
 *   Yamas - Yet Another Macro Assembler (for the PDP-8)
 *   Copyright (C) 2023 Folke Will <folko@solhost.org>
 *
 *   This program is free software: you can redistribute it and/or modify
 *   it under the terms of the GNU Affero General Public License as published by
 *   the Free Software Foundation, either version 3 of the License, or
 *   (at your option) any later version.
 *
 *   This program is distributed in the hope that it will be useful,
 *   but WITHOUT ANY WARRANTY; without even the implied warranty of
 *   MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
 *   GNU Affero General Public License for more details.
 *
 *   You should have received a copy of the GNU Affero General Public License
 *   along with this program.  If not, see <https://www.gnu.org/licenses/>.
 */

import type * as Nodes from "../parser/nodes/Node.js";
import { NodeType } from "../parser/nodes/Node.js";
import type { Operator } from "../utils/Operators.js";
import { type Result, err, map, ok } from "../utils/Result.js";
import { UnsupportedNodeError } from "./ConverterError.js";

// the result of triple i is referenced as "(i)", 1-based
export interface Triple {
    readonly operator: Operator;
    readonly arg1: string;
    readonly arg2: string;
}

export interface Quadruple {
    readonly operator: Operator;
    readonly arg1: string;
    readonly arg2: string;
    readonly result: string;
}

/**
 * Post-order walk that emits one instruction per binary operator.
 * Each subtree evaluates to the name its parent uses as argument:
 * the literal for leaves, whatever emit returns for operators.
 * A generator instance is used for exactly one conversion.
 */
abstract class CodeGenerator<T> {
    public readonly code: T[] = [];

    public generate(root: Nodes.Node): Result<T[], UnsupportedNodeError> {
        return map(this.visit(root), () => this.code);
    }

    protected abstract emit(operator: Operator, arg1: string, arg2: string): string;

    private visit(node: Nodes.Node): Result<string, UnsupportedNodeError> {
        switch (node.type) {
            case NodeType.Number:
                return ok(node.text);
            case NodeType.Identifier:
                return ok(node.name);
            case NodeType.BinaryOp: {
                const left = this.visit(node.left);
                if (!left.ok) {
                    return left;
                }
                const right = this.visit(node.right);
                if (!right.ok) {
                    return right;
                }
                return ok(this.emit(node.operator, left.value, right.value));
            }
            case NodeType.UnaryOp:
            case NodeType.Assignment:
                // not integrated with three-address code
                return err(new UnsupportedNodeError(node));
        }
    }
}

class TripleGenerator extends CodeGenerator<Triple> {
    protected emit(operator: Operator, arg1: string, arg2: string): string {
        this.code.push({ operator, arg1, arg2 });
        return `(${this.code.length})`;
    }
}

class QuadrupleGenerator extends CodeGenerator<Quadruple> {
    private tempCount = 0;

    protected emit(operator: Operator, arg1: string, arg2: string): string {
        const result = this.newTemp();
        this.code.push({ operator, arg1, arg2, result });
        return result;
    }

    private newTemp(): string {
        return `T${++this.tempCount}`;
    }
}

export function astToTriples(ast: Nodes.Node): Result<Triple[], UnsupportedNodeError> {
    return new TripleGenerator().generate(ast);
}

export function astToQuadruples(ast: Nodes.Node): Result<Quadruple[], UnsupportedNodeError> {
    return new QuadrupleGenerator().generate(ast);
}
