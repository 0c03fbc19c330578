/**
 * Copyright 2026 Arm Limited
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import type { Diagnostic } from '../errors';
import type { BinaryOperator } from './value-node';

export interface BaseNode {
    kind: string;
    start: number;
    end: number;
}
export interface NumberLiteral extends BaseNode { kind:'NumberLiteral'; value:number; raw:string; }
export interface StringLiteral extends BaseNode { kind:'StringLiteral'; value:string; raw:string; }
export interface Identifier extends BaseNode { kind:'Identifier'; name:string; }
export interface UnaryExpression extends BaseNode { kind:'UnaryExpression'; operator:'+'|'-'; argument:ASTNode; }
export interface BinaryExpression extends BaseNode { kind:'BinaryExpression'; operator:BinaryOperator; left:ASTNode; right:ASTNode; }
export interface KeywordArgument extends BaseNode { kind:'KeywordArgument'; name:string; value:ASTNode; }
export interface CallExpression extends BaseNode { kind:'CallExpression'; callee:Identifier; args:ASTNode[]; keywords:KeywordArgument[]; }
export interface ErrorNode extends BaseNode { kind:'ErrorNode'; message:string; }

export type ASTNode =
    | NumberLiteral | StringLiteral | Identifier
    | UnaryExpression | BinaryExpression | CallExpression | ErrorNode;

export interface ParseResult {
    ast: ASTNode;
    diagnostics: Diagnostic[];
}

/* ---------------- Tokenizer ---------------- */

type TokenKind = 'EOF'|'IDENT'|'NUMBER'|'STRING'|'PUNCT'|'UNKNOWN';
interface Token { kind: TokenKind; value: string; start: number; end: number; }

const SINGLE = new Set('(),+-*/='.split(''));

class Tokenizer {
    private s = '';
    private i = 0;
    private n = 0;
    constructor(s: string) {
        this.reset(s);
    }
    public reset(s: string) {
        this.s = s;
        this.i = 0;
        this.n = s.length;
    }
    public getIndex(): number {
        return this.i;
    }
    public setIndex(i: number): void {
        this.i = i;
    }
    public skipToEnd(): void {
        this.i = this.n;
    }
    public eof() {
        return this.i >= this.n;
    }
    public peek(k=0) {
        const j = this.i + k;
        return j < this.n ? this.s.charAt(j) : '';
    }
    public advance(k=1) {
        this.i += k;
    }
    public skipWS() {
        while (!this.eof() && /\s/.test(this.s.charAt(this.i))) {
            this.i++;
        }
    }
    public next(): Token {
        this.skipWS();
        if (this.eof()) {
            return { kind:'EOF', value:'', start:this.i, end:this.i };
        }

        const ch = this.peek(0);

        const isDigit = (c:string)=> c >= '0' && c <= '9';
        if (isDigit(ch) || (ch === '.' && isDigit(this.peek(1)))) {
            const start = this.i;
            while (!this.eof() && isDigit(this.peek())) {
                this.advance();
            }
            if (this.peek() === '.') {
                this.advance();
                while (!this.eof() && isDigit(this.peek())) {
                    this.advance();
                }
            }
            if (this.peek().toLowerCase() === 'e' && (isDigit(this.peek(1)) || (/[+-]/.test(this.peek(1)) && isDigit(this.peek(2))))) {
                this.advance(2);
                while (!this.eof() && isDigit(this.peek())) {
                    this.advance();
                }
            }
            return { kind:'NUMBER', value:this.s.slice(start, this.i), start, end:this.i };
        }

        const isAlpha = (c:string)=> (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
        if (isAlpha(ch)) {
            const start = this.i; this.advance();
            while (!this.eof() && (isAlpha(this.peek()) || isDigit(this.peek()))) {
                this.advance();
            }
            return { kind:'IDENT', value:this.s.slice(start, this.i), start, end:this.i };
        }

        if (ch === '"' || ch === '\'') {
            const quote = ch;
            const start = this.i;
            this.advance();
            let escaped = false;
            let closed = false;
            while (!this.eof()) {
                const c = this.peek();
                this.advance();
                if (escaped) {
                    escaped = false;
                } else if (c === '\\') {
                    escaped = true;
                } else if (c === quote) {
                    closed = true;
                    break;
                }
            }
            if (!closed) {
                return { kind:'UNKNOWN', value:this.s.slice(start, this.i), start, end:this.i };
            }
            return { kind:'STRING', value:this.s.slice(start, this.i), start, end:this.i };
        }

        if (SINGLE.has(ch)) {
            const start = this.i;
            this.advance();
            return { kind:'PUNCT', value:ch, start, end:this.i };
        }

        const start = this.i;
        this.advance();
        return { kind:'UNKNOWN', value:ch, start, end:this.i };
    }
}

/* ---------------- Parser ---------------- */

function span(start:number, end:number) {
    return { start, end };
}

function unescapeString(rawWithQuotes: string): string {
    const s = rawWithQuotes.slice(1, -1);
    let out = '';
    for (let i = 0; i < s.length; i++) {
        const ch = s.charAt(i);
        if (ch !== '\\') {
            out += ch; continue;
        }
        i++;
        if (i >= s.length) {
            out += '\\'; break;
        }
        const e = s.charAt(i);
        switch (e) {
            case 'n': out += '\n'; break;
            case 'r': out += '\r'; break;
            case 't': out += '\t'; break;
            default: out += e; break;
        }
    }
    return out;
}

/**
 * Recursive-descent parser for query expressions:
 *
 *     expression := term (('+' | '-') term)*
 *     term       := unary (('*' | '/') unary)*
 *     unary      := ('+' | '-') unary | primary
 *     primary    := NUMBER | STRING | IDENT | call | '(' expression ')'
 *     call       := IDENT '(' [argument (',' argument)*] ')'
 *     argument   := IDENT '=' expression | expression
 *
 * Problems are collected as diagnostics rather than thrown.
 */
export class Parser {
    private tok = new Tokenizer('');
    private cur: Token = this.tok.next();
    private diagnostics: Diagnostic[] = [];
    private depth = 0;

    private static PREC: Map<string, number> = new Map<string, number>([
        ['+', 1], ['-', 1],
        ['*', 2], ['/', 2],
    ]);
    private static MAX_DEPTH = 256;

    private reinit(s:string) {
        this.tok.reset(s);
        this.cur = this.tok.next();
        this.diagnostics = [];
        this.depth = 0;
    }

    public parse(input: string): ParseResult {
        this.reinit(input);

        let ast: ASTNode;
        if (this.curIs('EOF')) {
            this.error('Empty expression', 0, input.length);
            ast = { kind:'ErrorNode', message:'Empty expression', ...span(0, input.length) };
        } else {
            ast = this.parseExpression();
            if (!this.curIs('EOF')) {
                this.error(`Unexpected ${this.describeToken(this.cur)} after expression`, this.cur.start, this.cur.end);
            }
        }

        return {
            ast,
            diagnostics: this.diagnostics.slice(),
        };
    }

    /* ---------- diagnostics & token helpers ---------- */

    private error(msg:string, start:number, end:number) {
        this.diagnostics.push({ type:'error', message:msg, start, end });
    }

    private describeToken(t: Token): string {
        return t.kind === 'EOF' ? 'end of expression' : `'${t.value}'`;
    }

    private eat(kind:TokenKind, value?:string): Token {
        const t = this.cur;
        if (t.kind !== kind || (value !== undefined && t.value !== value)) {
            this.error(`Expected '${value ?? kind}' but found ${this.describeToken(t)}`, t.start, t.end);
            return t;
        }
        this.cur = this.tok.next();
        return t;
    }
    private tryEat(kind:TokenKind, value?:string): Token|undefined {
        const t = this.cur;
        if (t.kind === kind && (value === undefined || t.value === value)) {
            this.cur = this.tok.next(); return t;
        }
        return undefined;
    }
    private curIs(kind: TokenKind, value?: string): boolean {
        const t = this.cur;
        return t.kind === kind && (value === undefined || t.value === value);
    }
    private peekToken(): Token {
        const index = this.tok.getIndex();
        const t = this.tok.next();
        this.tok.setIndex(index);
        return t;
    }

    /* ---------- expression parsing ---------- */

    private parseExpression(): ASTNode {
        return this.parseBinary(1);
    }

    private parseBinary(minPrec: number): ASTNode {
        let node = this.parseUnary();
        while (this.cur.kind === 'PUNCT' && Parser.PREC.has(this.cur.value)) {
            const op = this.cur.value;
            const prec = Parser.PREC.get(op) ?? 0;
            if (prec < minPrec || !isBinaryOperator(op)) {
                break;
            }
            this.eat('PUNCT', op);
            const rhs = this.parseBinary(prec + 1);
            node = { kind:'BinaryExpression', operator:op, left:node, right:rhs, ...span(node.start, rhs.end) };
        }
        return node;
    }

    private parseUnary(): ASTNode {
        if (this.depth >= Parser.MAX_DEPTH) {
            const t = this.cur;
            const message = 'Expression nested too deeply';
            this.error(message, t.start, t.end);
            // give up on the rest of the input
            this.tok.skipToEnd();
            this.cur = this.tok.next();
            return { kind:'ErrorNode', message, ...span(t.start, t.end) };
        }
        this.depth++;
        try {
            if (this.curIs('PUNCT', '+') || this.curIs('PUNCT', '-')) {
                const t = this.eat('PUNCT');
                const operator = t.value === '-' ? '-' : '+';
                const argument = this.parseUnary();
                return { kind:'UnaryExpression', operator, argument, ...span(t.start, argument.end) };
            }
            return this.parsePrimary();
        } finally {
            this.depth--;
        }
    }

    private parsePrimary(): ASTNode {
        const t = this.cur;

        if (t.kind === 'NUMBER') {
            this.eat('NUMBER');
            const value = Number(t.value);
            if (!Number.isFinite(value)) {
                this.error(`Invalid number literal '${t.value}'`, t.start, t.end);
            }
            return { kind:'NumberLiteral', value, raw:t.value, ...span(t.start, t.end) };
        }

        if (t.kind === 'STRING') {
            this.eat('STRING');
            return { kind:'StringLiteral', value:unescapeString(t.value), raw:t.value, ...span(t.start, t.end) };
        }

        if (t.kind === 'IDENT') {
            this.eat('IDENT');
            const callee: Identifier = { kind:'Identifier', name:t.value, ...span(t.start, t.end) };
            if (this.curIs('PUNCT', '(')) {
                return this.parseCall(callee);
            }
            return callee;
        }

        if (this.tryEat('PUNCT', '(')) {
            const inner = this.parseExpression();
            const close = this.eat('PUNCT', ')');
            // keep the outer span so diagnostics point at the parentheses
            return { ...inner, ...span(t.start, close.end) };
        }

        const message = t.kind === 'UNKNOWN' && (t.value.startsWith('"') || t.value.startsWith('\''))
            ? 'Unterminated string literal'
            : `Unexpected ${this.describeToken(t)}`;
        this.error(message, t.start, t.end);
        if (t.kind !== 'EOF') {
            this.cur = this.tok.next();
        }
        return { kind:'ErrorNode', message, ...span(t.start, t.end) };
    }

    private parseCall(callee: Identifier): CallExpression {
        this.eat('PUNCT', '(');
        const args: ASTNode[] = [];
        const keywords: KeywordArgument[] = [];

        while (!this.curIs('PUNCT', ')') && !this.curIs('EOF')) {
            if (this.curIs('IDENT') && this.peekToken().value === '=') {
                const name = this.eat('IDENT');
                this.eat('PUNCT', '=');
                const value = this.parseExpression();
                if (keywords.some(k => k.name === name.value)) {
                    this.error(`Duplicate keyword argument '${name.value}'`, name.start, name.end);
                }
                keywords.push({ kind:'KeywordArgument', name:name.value, value, ...span(name.start, value.end) });
            } else {
                const arg = this.parseExpression();
                if (keywords.length > 0) {
                    this.error('Positional argument follows keyword argument', arg.start, arg.end);
                }
                args.push(arg);
            }
            if (!this.tryEat('PUNCT', ',')) {
                break;
            }
        }

        const close = this.eat('PUNCT', ')');
        return { kind:'CallExpression', callee, args, keywords, ...span(callee.start, close.end) };
    }
}

function isBinaryOperator(op: string): op is BinaryOperator {
    return op === '+' || op === '-' || op === '*' || op === '/';
}

export function parseExpression(input: string): ParseResult {
    return new Parser().parse(input);
}
