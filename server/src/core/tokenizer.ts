import { builtinDefs, type Defs } from '../defs';
import { type Token, type Trivia, TokenStream } from './tokens';

type TokenizerOptions = {
	filename?: string;
	defs?: Defs;
};

// Longest first: the scanner takes the first entry that matches.
const OPERATORS = [
	'<<=', '>>=',
	'==', '!=', '<=', '>=', '&&', '||', '^^', '<<', '>>',
	'+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '++', '--',
	'+', '-', '*', '/', '%', '!', '~', '<', '>', '=', '&', '|', '^', '.', '?', ':',
] as const;
const PUNCT = new Set([';', ',', '(', ')', '{', '}', '[', ']']);

const isDigit = (ch: string) => ch >= '0' && ch <= '9';
const isHexDigit = (ch: string) => isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
const isIdStart = (ch: string) => (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
const isIdContinue = (ch: string) => isIdStart(ch) || isDigit(ch);

// Pull-based scanner: consumes whitespace and line continuations, attaches
// comments to the next token as trivia and emits directives as single tokens.
// Never throws; malformed input becomes 'error' tokens.
export class Tokenizer {
	private i = 0;
	private readonly n: number;
	private readonly text: string;
	private readonly lineOffsets: number[];
	private readonly filename: string;
	private readonly defs: Defs;
	private readonly ts: TokenStream;
	private trivia: Trivia[] = [];

	constructor(text: string, opts?: TokenizerOptions) {
		this.text = text;
		this.n = text.length;
		this.lineOffsets = computeLineOffsets(text);
		this.filename = opts?.filename ?? 'memory.glsl';
		this.defs = opts?.defs ?? builtinDefs();
		this.ts = new TokenStream({ producer: () => this.scanOne() });
	}

	next(): Token { return this.ts.next(); }
	peek(): Token { return this.ts.peek(); }
	pushBack(t: Token) { this.ts.pushBack(t); }

	private ch(pos: number): string { return this.text.charAt(pos); }

	private scanOne(): Token {
		for (;;) {
			this.skipWhitespace();
			if (this.i >= this.n) return this.mk('eof', '', this.i, this.i);
			const c = this.ch(this.i);
			if (c === '/' && this.ch(this.i + 1) === '/') {
				const s = this.i; const e = this.findLineEnd(s);
				this.trivia.push({ kind: 'comment-line', value: this.text.slice(s, e), span: { start: s, end: e } });
				this.i = e;
				continue;
			}
			if (c === '/' && this.ch(this.i + 1) === '*') {
				const s = this.i;
				const close = this.text.indexOf('*/', s + 2);
				if (close < 0) {
					// unterminated: the rest of the file is swallowed by the comment
					this.i = this.n;
					return this.mkError(s, this.n, 'unterminated block comment');
				}
				this.trivia.push({ kind: 'comment-block', value: this.text.slice(s, close + 2), span: { start: s, end: close + 2 } });
				this.i = close + 2;
				continue;
			}
			break;
		}

		const c = this.ch(this.i);
		if (c === '#' && this.atLineStart(this.i)) return this.scanDirective();
		if (c === '"') return this.scanString();
		if (isDigit(c) || (c === '.' && isDigit(this.ch(this.i + 1)))) return this.scanNumber();
		if (isIdStart(c)) {
			const s = this.i; let j = s + 1;
			while (j < this.n && isIdContinue(this.ch(j))) j++;
			const word = this.text.slice(s, j);
			this.i = j;
			return this.mk(this.classifyWord(word), word, s, j);
		}
		for (const op of OPERATORS) {
			if (this.text.startsWith(op, this.i)) {
				const s = this.i; this.i += op.length;
				return this.mk('op', op, s, this.i);
			}
		}
		if (PUNCT.has(c)) { const s = this.i; this.i++; return this.mk('punct', c, s, this.i); }

		// invalid character: report it and resume right after it
		const s = this.i;
		const cp = this.text.codePointAt(s) ?? 0;
		this.i += cp > 0xffff ? 2 : 1;
		return this.mkError(s, this.i, `invalid character '${String.fromCodePoint(cp)}'`);
	}

	private classifyWord(word: string): Token['kind'] {
		if (this.defs.qualifiers.has(word)) return 'qualifier';
		if (this.defs.keywords.has(word) || this.defs.types.has(word)) return 'keyword';
		return 'id';
	}

	private skipWhitespace() {
		while (this.i < this.n) {
			const ch = this.ch(this.i);
			if (ch === '\\') {
				// splice line continuations outside directives
				let k = this.i + 1; while (k < this.n && (this.ch(k) === ' ' || this.ch(k) === '\t')) k++;
				if (this.ch(k) === '\n') { this.i = k + 1; continue; }
				if (this.ch(k) === '\r' && this.ch(k + 1) === '\n') { this.i = k + 2; continue; }
				return;
			}
			if (ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n' || ch === '\f' || ch === '\v') { this.i++; continue; }
			return;
		}
	}

	private scanDirective(): Token {
		const s = this.i; let j = s + 1;
		while (j < this.n) {
			if (this.ch(j) === '\\') {
				let k = j + 1; while (k < this.n && (this.ch(k) === ' ' || this.ch(k) === '\t')) k++;
				if (this.ch(k) === '\n') { j = k + 1; continue; }
				if (this.ch(k) === '\r' && this.ch(k + 1) === '\n') { j = k + 2; continue; }
			}
			if (this.ch(j) === '\n') break;
			j++;
		}
		let e = j;
		if (e > s && this.ch(e - 1) === '\r') e--;
		this.i = j;
		return this.mk('directive', this.text.slice(s, e), s, e);
	}

	private scanString(): Token {
		const s = this.i; let j = s + 1;
		while (j < this.n) {
			const ch = this.ch(j);
			if (ch === '\\') { j += 2; continue; }
			if (ch === '"') { this.i = j + 1; return this.mk('string', this.text.slice(s, j + 1), s, j + 1); }
			if (ch === '\n') break;
			j++;
		}
		const e = Math.min(j, this.n);
		this.i = e;
		return this.mkError(s, e, 'unterminated string literal');
	}

	private scanNumber(): Token {
		const s = this.i; let j = s;
		if (this.ch(j) === '0' && (this.ch(j + 1) === 'x' || this.ch(j + 1) === 'X')) {
			j += 2;
			while (j < this.n && isHexDigit(this.ch(j))) j++;
		} else {
			let sawDot = false;
			while (j < this.n) {
				const ch = this.ch(j);
				if (isDigit(ch)) { j++; continue; }
				if (ch === '.' && !sawDot) { sawDot = true; j++; continue; }
				break;
			}
			if (this.ch(j) === 'e' || this.ch(j) === 'E') {
				let k = j + 1;
				if (this.ch(k) === '+' || this.ch(k) === '-') k++;
				if (isDigit(this.ch(k))) {
					while (k < this.n && isDigit(this.ch(k))) k++;
					j = k;
				}
			}
		}
		// suffixes: f F lf LF u U
		if (this.text.startsWith('lf', j) || this.text.startsWith('LF', j)) j += 2;
		else if ('fFuU'.includes(this.ch(j)) && this.ch(j) !== '') j++;
		this.i = j;
		return this.mk('number', this.text.slice(s, j), s, j);
	}

	private atLineStart(pos: number): boolean {
		let k = pos - 1;
		while (k >= 0 && (this.ch(k) === ' ' || this.ch(k) === '\t')) k--;
		return k < 0 || this.ch(k) === '\n';
	}

	private findLineEnd(pos: number): number {
		let i = pos; while (i < this.n && this.text[i] !== '\n') i++;
		if (i > pos && this.ch(i - 1) === '\r') return i - 1;
		return i;
	}

	private mkError(start: number, end: number, error: string): Token {
		return { ...this.mk('error', this.text.slice(start, end), start, end), error };
	}

	private mk(kind: Token['kind'], value: string, start: number, end: number): Token {
		const leading = this.trivia;
		this.trivia = [];
		const line = lineNumberFor(this.lineOffsets, start);
		const lineStart = this.lineOffsets[line - 1] ?? 0;
		return { kind, value, span: { start, end }, line, column: start - lineStart + 1, file: this.filename, leading };
	}
}

/** Lazily yields the tokens of `text`, ending with a single 'eof' token. */
export function* tokenize(text: string, opts?: TokenizerOptions): Generator<Token, void, undefined> {
	const tz = new Tokenizer(text, opts);
	for (;;) {
		const t = tz.next();
		yield t;
		if (t.kind === 'eof') return;
	}
}

export function computeLineOffsets(text: string): number[] {
	const out = [0];
	for (let i = 0; i < text.length; i++) { if (text[i] === '\n') out.push(i + 1); }
	return out;
}

function lineNumberFor(lineOffsets: readonly number[], pos: number): number {
	// Binary search for the greatest offset <= pos
	let lo = 0, hi = lineOffsets.length - 1, ans = 0;
	while (lo <= hi) {
		const mid = (lo + hi) >> 1;
		const off = lineOffsets[mid] ?? 0;
		if (off <= pos) { ans = mid; lo = mid + 1; }
		else { hi = mid - 1; }
	}
	return ans + 1; // 1-based line numbers
}
