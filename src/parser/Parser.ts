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

import { tokenize } from "../lexer/Lexer.js";
import { EmptyInputError, type LexError } from "../lexer/LexerError.js";
import { type Token, TokenType } from "../lexer/Token.js";
import type { Operator } from "../utils/Operators.js";
import { type Result, andThen, err, ok } from "../utils/Result.js";
import {
    InvalidAssignmentTargetError, MissingClosingParenError, TrailingTokensError,
    UnexpectedEndOfInputError, UnexpectedTokenError,
} from "./ParserError.js";
import type * as Nodes from "./nodes/Node.js";
import { NodeType } from "./nodes/Node.js";

export type ParserError =
    EmptyInputError | UnexpectedTokenError | UnexpectedEndOfInputError |
    MissingClosingParenError | TrailingTokensError | InvalidAssignmentTargetError;

type NodeResult = Result<Nodes.Node, ParserError>;

/**
 * Recursive descent parser for infix expressions.
 *
 * Precedence, lowest first:
 *   assignment      X = expr        right-associative, target must be an identifier
 *   additive        + -             left-associative
 *   multiplicative  * /             left-associative
 *   power           ^               right-associative
 *   primary         number, identifier, ( expr )
 */
export class Parser {
    private tokens: readonly Token[];
    private pos = 0;

    public constructor(tokens: readonly Token[]) {
        this.tokens = tokens;
    }

    /**
     * Parse the whole token stream. Fails if any token is left after a complete expression.
     */
    public parse(): NodeResult {
        if (this.tokens.length == 0) {
            return err(new EmptyInputError());
        }

        const res = this.parseExpr();
        if (!res.ok) {
            return res;
        }

        if (this.pos < this.tokens.length) {
            return err(new TrailingTokensError(this.tokens.slice(this.pos)));
        }

        return res;
    }

    private parseExpr(): NodeResult {
        return this.parseAssignment();
    }

    private parseAssignment(): NodeResult {
        const left = this.parseAdditive();
        if (!left.ok) {
            return left;
        }

        const tok = this.current();
        if (!tok || tok.type != TokenType.Assign) {
            return left;
        }

        const target = left.value;
        if (target.type != NodeType.Identifier) {
            return err(new InvalidAssignmentTargetError(tok.position));
        }
        this.advance();

        const value = this.parseAssignment();
        if (!value.ok) {
            return value;
        }

        const assignment: Nodes.AssignmentNode = {
            type: NodeType.Assignment,
            target: target,
            value: value.value,
        };
        return ok(assignment);
    }

    private parseAdditive(): NodeResult {
        return this.parseLeftAssoc(["+", "-"], () => this.parseMultiplicative());
    }

    private parseMultiplicative(): NodeResult {
        return this.parseLeftAssoc(["*", "/"], () => this.parsePower());
    }

    // operand (op operand)* folded to the left
    private parseLeftAssoc(ops: readonly Operator[], parseOperand: () => NodeResult): NodeResult {
        const first = parseOperand();
        if (!first.ok) {
            return first;
        }

        let node = first.value;
        while (true) {
            const tok = this.current();
            if (!tok || tok.type != TokenType.Operator || !ops.includes(tok.text)) {
                break;
            }
            this.advance();

            const right = parseOperand();
            if (!right.ok) {
                return right;
            }

            const binOp: Nodes.BinaryOpNode = {
                type: NodeType.BinaryOp,
                left: node,
                operator: tok.text,
                right: right.value,
            };
            node = binOp;
        }

        return ok(node);
    }

    private parsePower(): NodeResult {
        const base = this.parsePrimary();
        if (!base.ok) {
            return base;
        }

        const tok = this.current();
        if (!tok || tok.type != TokenType.Operator || tok.text != "^") {
            return base;
        }
        this.advance();

        const exponent = this.parsePower();
        if (!exponent.ok) {
            return exponent;
        }

        const binOp: Nodes.BinaryOpNode = {
            type: NodeType.BinaryOp,
            left: base.value,
            operator: "^",
            right: exponent.value,
        };
        return ok(binOp);
    }

    private parsePrimary(): NodeResult {
        const tok = this.current();
        if (!tok) {
            return err(new UnexpectedEndOfInputError(this.endPosition()));
        }

        switch (tok.type) {
            case TokenType.LParen:
                return this.parseParenExpr(tok);
            case TokenType.Number:
                this.advance();
                return ok(this.toNumberNode(tok.text));
            case TokenType.Identifier: {
                this.advance();
                const ident: Nodes.IdentifierNode = { type: NodeType.Identifier, name: tok.text };
                return ok(ident);
            }
            case TokenType.Operator:
            case TokenType.RParen:
            case TokenType.Assign:
                return err(new UnexpectedTokenError(tok));
        }
    }

    private parseParenExpr(open: Token): NodeResult {
        this.advance();

        const inner = this.parseExpr();
        if (!inner.ok) {
            return inner;
        }

        const closing = this.current();
        if (!closing || closing.type != TokenType.RParen) {
            return err(new MissingClosingParenError(open.position));
        }
        this.advance();

        return inner;
    }

    private toNumberNode(literal: string): Nodes.NumberNode {
        return {
            type: NodeType.Number,
            text: literal,
            value: Number(literal),
            float: literal.includes("."),
        };
    }

    private current(): Token | undefined {
        return this.pos < this.tokens.length ? this.tokens[this.pos] : undefined;
    }

    private advance() {
        this.pos++;
    }

    // offset just behind the last token
    private endPosition(): number {
        const last = this.tokens[this.tokens.length - 1];
        return last ? last.position + last.text.length : 0;
    }
}

export function parse(expression: string): Result<Nodes.Node, LexError | ParserError> {
    return andThen(tokenize(expression), tokens => new Parser(tokens).parse());
}
