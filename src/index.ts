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

export * from "./Notation.js";
export * from "./lexer/Lexer.js";
export * from "./lexer/LexerError.js";
export * from "./lexer/Token.js";
export * from "./lexer/formatToken.js";
export * from "./parser/Parser.js";
export * from "./parser/ParserError.js";
export * from "./parser/nodes/Node.js";
export * from "./parser/nodes/dumpAst.js";
export * from "./converter/ConverterError.js";
export * from "./converter/Polish.js";
export * from "./converter/ShuntingYard.js";
export * from "./converter/ThreeAddressCode.js";
export * from "./evaluator/Arithmetic.js";
export * from "./evaluator/AstEvaluator.js";
export * from "./evaluator/EvaluatorError.js";
export * from "./evaluator/PostfixEvaluator.js";
export * from "./utils/CodeError.js";
export * from "./utils/Operators.js";
export * from "./utils/Result.js";
