import { MalformedDescription, UnboundedConstruction } from './errors';

export type letter	= string;
export type state	= string;

// reserved empty-string symbol; never part of an exposed alphabet
export const EPSILON = 'ε';

/**
 * Anything that recognises a language one symbol at a time.
 * State elimination and the asynchronous product only depend on this shape.
 */
export interface Acceptor<S = state> {
	readonly states:	readonly S[];
	readonly alphabet:	readonly letter[];
	readonly start:		S;
	next(from: S, input: letter): S | undefined;
	isFinal(s: S): boolean;
}

export interface Edge<S = state> {
	from:	S;
	input:	letter;
	to:		S;
}

//-----------------------------------------------------------------------------
//	Logging
//-----------------------------------------------------------------------------

/**
 * Logger interface compatible with console.
 * Both methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug:	(...args: unknown[]) => string;
	warn:	(...args: unknown[]) => string;
}

export const defaultLogger: Logger = {
	debug: (...args: unknown[]) => {
		console.debug(...args);
		return String(args[0] ?? '');
	},
	warn: (...args: unknown[]) => {
		console.warn(...args);
		return String(args[0] ?? '');
	},
};

//-----------------------------------------------------------------------------
//	Construction options
//-----------------------------------------------------------------------------

export interface options {
	/** Cap on the number of states a construction may produce */
	maxStates?:	number;
	/** Enable debug logging (default: false) */
	debug?:		boolean;
	/** Custom logger implementing Logger interface (default: console) */
	logger?:	Logger;
}

export interface Tracer {
	debug(...args: unknown[]): void;
	// throws UnboundedConstruction once count goes past maxStates
	check(count: number): void;
}

export function tracer(tag: string, opts: options = {}, defaultMax = Infinity): Tracer {
	const logger	= opts.logger ?? defaultLogger;
	const limit		= opts.maxStates ?? defaultMax;
	return {
		debug(...args: unknown[]) {
			if (opts.debug)
				logger.debug(`[${tag}]`, ...args);
		},
		check(count: number) {
			if (count > limit) {
				logger.warn(`[${tag}]`, `state cap of ${limit} exceeded`);
				throw new UnboundedConstruction(tag, limit);
			}
		}
	};
}

// Backslash-escapes the separators used when composing state names
export function escapeName(name: string): string {
	return name.replace(/[\\/,()]/g, '\\$&');
}

//-----------------------------------------------------------------------------
//	Description validation
//-----------------------------------------------------------------------------

export function uniqueList<T>(what: string, items: readonly T[]): readonly T[] {
	const seen = new Set<T>();
	for (const i of items) {
		if (seen.has(i))
			throw new MalformedDescription(`duplicate ${what} '${String(i)}'`);
		seen.add(i);
	}
	return [...items];
}

export function checkMember<T>(what: string, set: ReadonlySet<T>, item: T): T {
	if (!set.has(item))
		throw new MalformedDescription(`unknown ${what} '${String(item)}'`);
	return item;
}
