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

import * as Nodes from "./Node.js";

export function dumpAst(node: Nodes.Node, write: (line: string) => void, indent = 0) {
    const indStr = "".padStart(2 * indent);

    switch (node.type) {
        case Nodes.NodeType.Number:
        case Nodes.NodeType.Identifier:
            write(indStr + formatNode(node));
            break;
        case Nodes.NodeType.BinaryOp:
            write(indStr + `BinaryOp('${node.operator}'`);
            dumpAst(node.left, write, indent + 1);
            dumpAst(node.right, write, indent + 1);
            write(indStr + ")");
            break;
        case Nodes.NodeType.UnaryOp:
            write(indStr + `UnaryOp('${node.operator}'`);
            dumpAst(node.operand, write, indent + 1);
            write(indStr + ")");
            break;
        case Nodes.NodeType.Assignment:
            write(indStr + `Assignment(${formatNode(node.target)}`);
            dumpAst(node.value, write, indent + 1);
            write(indStr + ")");
            break;
    }
}

export function formatNode(node: Nodes.Node): string {
    switch (node.type) {
        case Nodes.NodeType.Number:
            return `Number(${node.text})`;
        case Nodes.NodeType.Identifier:
            return `Identifier(${node.name})`;
        case Nodes.NodeType.BinaryOp:
            return `BinaryOp(${formatNode(node.left)}, '${node.operator}', ${formatNode(node.right)})`;
        case Nodes.NodeType.UnaryOp:
            return `UnaryOp('${node.operator}', ${formatNode(node.operand)})`;
        case Nodes.NodeType.Assignment:
            return `Assignment(${formatNode(node.target)}, ${formatNode(node.value)})`;
    }
}
