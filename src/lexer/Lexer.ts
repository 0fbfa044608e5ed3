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

import { isOperator } from "../utils/Operators.js";
import { type Result, err, ok } from "../utils/Result.js";
import { EmptyInputError, LexError } from "./LexerError.js";
import { type Token, TokenType } from "./Token.js";

export type LexerResult = Result<Token[], EmptyInputError | LexError>;

// a successful scan: the characters consumed and the token, if it isn't skipped
interface Scanned {
    width: number;
    token?: Token;
}

export class Lexer {
    private static NumberRegex = /\d+(\.\d+)?/y;
    private static IdentifierRegex = /[A-Za-z_][A-Za-z0-9_]*/y;
    // ASCII only: everything the lexer accepts is one byte per character,
    // so string offsets are byte offsets
    private static BlankRegex = /[ \t\r\n\v\f]+/y;
    private static AllBlankRegex = /^[ \t\r\n\v\f]*$/;
    private input: string;

    // tried in this order at every offset, first hit wins
    private scanners: ((pos: number) => Scanned | undefined)[] = [
        this.scanNumber.bind(this),
        this.scanIdentifier.bind(this),
        this.scanOperator.bind(this),
        this.scanChar.bind(this),
        this.scanBlank.bind(this),
    ];

    public constructor(input: string) {
        this.input = input;
    }

    public getInput(): string {
        return this.input;
    }

    /**
     * Split the input into tokens. Each call scans the input again and returns a fresh array.
     */
    public tokenize(): LexerResult {
        if (Lexer.AllBlankRegex.test(this.input)) {
            return err(new EmptyInputError());
        }

        const tokens: Token[] = [];
        let pos = 0;
        while (pos < this.input.length) {
            const scanned = this.scanAt(pos);
            if (!scanned) {
                // report the whole run of characters that no pattern accepts
                let end = pos + 1;
                while (end < this.input.length && !this.scanAt(end)) {
                    end++;
                }
                return err(new LexError(this.input.substring(pos, end), pos));
            }

            if (scanned.token) {
                tokens.push(scanned.token);
            }
            pos += scanned.width;
        }

        return ok(tokens);
    }

    private scanAt(pos: number): Scanned | undefined {
        for (const scanner of this.scanners) {
            const res = scanner(pos);
            if (res) {
                return res;
            }
        }
        return undefined;
    }

    private matchAt(regex: RegExp, pos: number): string | undefined {
        regex.lastIndex = pos;
        const match = regex.exec(this.input);
        return match ? match[0] : undefined;
    }

    private scanNumber(pos: number): Scanned | undefined {
        const text = this.matchAt(Lexer.NumberRegex, pos);
        if (text === undefined) {
            return undefined;
        }
        return { width: text.length, token: { type: TokenType.Number, text, position: pos } };
    }

    private scanIdentifier(pos: number): Scanned | undefined {
        const text = this.matchAt(Lexer.IdentifierRegex, pos);
        if (text === undefined) {
            return undefined;
        }
        return { width: text.length, token: { type: TokenType.Identifier, text, position: pos } };
    }

    private scanOperator(pos: number): Scanned | undefined {
        const chr = this.input[pos];
        if (!isOperator(chr)) {
            return undefined;
        }
        return { width: 1, token: { type: TokenType.Operator, text: chr, position: pos } };
    }

    private scanChar(pos: number): Scanned | undefined {
        switch (this.input[pos]) {
            case "=":   return { width: 1, token: { type: TokenType.Assign, text: "=", position: pos } };
            case "(":   return { width: 1, token: { type: TokenType.LParen, text: "(", position: pos } };
            case ")":   return { width: 1, token: { type: TokenType.RParen, text: ")", position: pos } };
        }
        return undefined;
    }

    private scanBlank(pos: number): Scanned | undefined {
        const blank = this.matchAt(Lexer.BlankRegex, pos);
        if (blank === undefined) {
            return undefined;
        }
        return { width: blank.length };
    }
}

export function tokenize(expression: string): LexerResult {
    return new Lexer(expression).tokenize();
}
