import { type Result } from "../src/utils/Result.js";
import { type Token, TokenType } from "../src/lexer/Token.js";

export function expectOk<T, E>(res: Result<T, E>): T {
    if (!res.ok) {
        throw new Error(`Expected success, got ${String(res.error)}`);
    }
    return res.value;
}

export function expectErr<T, E>(res: Result<T, E>): E {
    if (res.ok) {
        throw new Error(`Expected failure, got ${JSON.stringify(res.value)}`);
    }
    return res.error;
}

export function describeTokens(tokens: Token[]): [string, string][] {
    return tokens.map(t => [TokenType[t.type], t.text]);
}
