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

import { parse, type ParserError } from "../parser/Parser.js";
import type * as Nodes from "../parser/nodes/Node.js";
import { NodeType } from "../parser/nodes/Node.js";
import type { LexError } from "../lexer/LexerError.js";
import { type Result, andThen, err, ok } from "../utils/Result.js";
import { UnsupportedNodeError } from "./ConverterError.js";

type Order = "prefix" | "postfix";

/**
 * Render a tree in prefix notation: operator, left operand, right operand.
 */
export function astToPrefix(node: Nodes.Node): Result<string, UnsupportedNodeError> {
    return linearize(node, "prefix");
}

/**
 * Render a tree in postfix notation. For trees without assignments this matches
 * the shunting-yard output for the same input.
 */
export function astToPostfix(node: Nodes.Node): Result<string, UnsupportedNodeError> {
    return linearize(node, "postfix");
}

export function convertToPrefix(expression: string): Result<string, LexError | ParserError | UnsupportedNodeError> {
    return andThen(parse(expression), astToPrefix);
}

function linearize(root: Nodes.Node, order: Order): Result<string, UnsupportedNodeError> {
    const parts: string[] = [];

    const traverse = (node: Nodes.Node): UnsupportedNodeError | undefined => {
        switch (node.type) {
            case NodeType.Number:
                parts.push(node.text);
                return undefined;
            case NodeType.Identifier:
                parts.push(node.name);
                return undefined;
            case NodeType.BinaryOp: {
                if (order == "prefix") {
                    parts.push(node.operator);
                }
                const error = traverse(node.left) ?? traverse(node.right);
                if (order == "postfix") {
                    parts.push(node.operator);
                }
                return error;
            }
            case NodeType.UnaryOp:
            case NodeType.Assignment:
                return new UnsupportedNodeError(node);
        }
    };

    const error = traverse(root);
    return error ? err(error) : ok(parts.join(" "));
}
