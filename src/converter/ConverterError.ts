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

import { formatNode } from "../parser/nodes/dumpAst.js";
import type { Node } from "../parser/nodes/Node.js";
import { CodeError } from "../utils/CodeError.js";
import { replaceNonPrints } from "../utils/Strings.js";

export class UnbalancedParenError extends CodeError {
    public readonly kind = "UnbalancedParenError";
    public readonly paren: "(" | ")";

    public constructor(paren: "(" | ")") {
        super(paren == "(" ? "Opening parenthesis without matching closing one" : "Closing parenthesis without matching opening one");
        this.paren = paren;
    }
}

export class InvalidTokenError extends CodeError {
    public readonly kind = "InvalidTokenError";
    public readonly token: string;

    public constructor(token: string) {
        super(`Invalid token '${replaceNonPrints(token)}'`);
        this.token = token;
    }
}

// assignments and unary operators have no three-address or polish form
export class UnsupportedNodeError extends CodeError {
    public readonly kind = "UnsupportedNodeError";
    public readonly node: Node;

    public constructor(node: Node) {
        super(`Cannot convert ${formatNode(node)}`);
        this.node = node;
    }
}
