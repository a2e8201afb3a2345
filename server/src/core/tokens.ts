// Core token model shared by the tokenizer, parser and token-level rules

export type Span = { start: number; end: number };

export type TokenKind =
	| 'id'
	| 'keyword' // control words and built-in type names
	| 'qualifier' // storage/precision/interpolation qualifiers and `layout`
	| 'number'
	| 'string'
	| 'op'
	| 'punct'
	| 'directive' // entire preprocessor line (combined with continuations)
	| 'error' // malformed input the tokenizer skipped over
	| 'eof';

export type TriviaKind = 'comment-line' | 'comment-block';

export interface Trivia {
	kind: TriviaKind;
	value: string;
	span: Span;
}

export interface Token {
	readonly kind: TokenKind;
	readonly value: string;
	readonly span: Span;
	// 1-based position of span.start
	readonly line: number;
	readonly column: number;
	readonly file: string;
	// comments directly preceding this token
	readonly leading: readonly Trivia[];
	// set on 'error' tokens
	readonly error?: string;
}

export class TokenStream {
	// Source can be a static array of tokens or a producer function

	private readonly arr?: readonly Token[];
	private readonly producer?: () => Token;
	private idx = 0;
	private pushback: Token[] = [];
	private stickyEof: Token | null = null;
	private lastEnd = 0;

	constructor(source: readonly Token[] | { producer: () => Token }) {
		if (isTokenArray(source)) {
			this.arr = source;
			const last = source[source.length - 1];
			if (last) this.lastEnd = last.span.end;
		} else {
			this.producer = source.producer;
		}
	}

	next(): Token {
		if (this.stickyEof) {
			return this.stickyEof;
		}
		const pushed = this.pushback.pop();
		if (pushed) {
			this.lastEnd = pushed.span.end;
			return pushed;
		}
		let t: Token;
		if (this.arr) {
			const fromArr = this.idx < this.arr.length ? this.arr[this.idx] : undefined;
			if (fromArr) {
				this.idx++;
				t = fromArr;
			} else {
				const file = this.arr.length > 0 ? this.arr[this.arr.length - 1]?.file ?? '<unknown>' : '<unknown>';
				t = syntheticEof(this.lastEnd, file);
			}
		} else if (this.producer) {
			t = this.producer();
		} else {
			t = syntheticEof(this.lastEnd, '<unknown>');
		}
		if (t.kind === 'eof') { this.stickyEof = t; return t; }
		this.lastEnd = t.span.end;
		return t;
	}

	peek(): Token {
		const t = this.next();
		if (t.kind !== 'eof') this.pushBack(t);
		return t;
	}

	pushBack(t: Token) {
		if (t.kind === 'eof') return; // ignore pushing back EOF
		this.pushback.push(t);
	}

	/**
	 * Backtracking is only available over array sources: `mark()` returns the
	 * current read position and `reset()` rewinds to it.
	 */
	mark(): number {
		if (!this.arr) throw new Error('TokenStream.mark() requires an array source');
		return this.idx - this.pushback.length;
	}

	reset(mark: number) {
		if (!this.arr) throw new Error('TokenStream.reset() requires an array source');
		this.pushback = [];
		this.stickyEof = null;
		this.idx = mark;
		const prev = mark > 0 ? this.arr[mark - 1] : undefined;
		this.lastEnd = prev ? prev.span.end : 0;
	}
}

function isTokenArray(source: readonly Token[] | { producer: () => Token }): source is readonly Token[] {
	return Array.isArray(source);
}

function syntheticEof(at: number, file: string): Token {
	return { kind: 'eof', value: '', span: { start: at, end: at }, line: 0, column: 0, file, leading: [] };
}
