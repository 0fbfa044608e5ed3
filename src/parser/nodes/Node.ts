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

import type { Operator } from "../../utils/Operators.js";

export enum NodeType {
    Number, Identifier,
    BinaryOp, UnaryOp,
    Assignment,
}

export type Node =
    NumberNode | IdentifierNode |
    BinaryOpNode | UnaryOpNode |
    AssignmentNode;

export type UnaryOpChr = "+" | "-";

export interface BaseNode {
    readonly type: NodeType;
}

// 42, 2.5 - float is set if the literal had a decimal point,
// text is the literal as written and is what every converter prints
export interface NumberNode extends BaseNode {
    readonly type: NodeType.Number;
    readonly text: string;
    readonly value: number;
    readonly float: boolean;
}

// A, x_1
export interface IdentifierNode extends BaseNode {
    readonly type: NodeType.Identifier;
    readonly name: string;
}

// A+B, A^B
export interface BinaryOpNode extends BaseNode {
    readonly type: NodeType.BinaryOp;
    readonly left: Node;
    readonly operator: Operator;
    readonly right: Node;
}

// -A: part of the tree model, the parser never produces it
export interface UnaryOpNode extends BaseNode {
    readonly type: NodeType.UnaryOp;
    readonly operator: UnaryOpChr;
    readonly operand: Node;
}

// X=A+B, X=Y=A
export interface AssignmentNode extends BaseNode {
    readonly type: NodeType.Assignment;
    readonly target: IdentifierNode;
    readonly value: Node;
}
