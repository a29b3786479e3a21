/**
 * What every payload implements. The StringMatcher dispatches to these two
 * methods; payloads never see the container that holds them.
 */
export interface MatchStrategy {
	match(input: string): boolean;
	describe(): string;
}

/** Anything that accepts text: a Node writable stream, a test buffer, a logger adapter. */
export interface TextSink {
	write(chunk: string): unknown;
}
