export type AutomatonErrorKind =
	| 'MalformedDescription'
	| 'EmptyNetwork'
	| 'UnboundedConstruction';

/** Base class for every error raised while building or transforming an automaton. */
export class AutomatonError extends Error {
	constructor(readonly kind: AutomatonErrorKind, message: string) {
		super(message);
		this.name = 'AutomatonError';
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** Structurally invalid automaton, regex or text description. */
export class MalformedDescription extends AutomatonError {
	constructor(message: string) {
		super('MalformedDescription', message);
		this.name = 'MalformedDescription';
	}
}

/** Fewer than two automata given to the asynchronous product. */
export class EmptyNetwork extends AutomatonError {
	constructor(readonly count: number) {
		super('EmptyNetwork', `asynchronous product needs at least two automata, got ${count}`);
		this.name = 'EmptyNetwork';
	}
}

/** A worklist construction produced more states than the caller allowed. */
export class UnboundedConstruction extends AutomatonError {
	constructor(readonly construction: string, readonly limit: number) {
		super('UnboundedConstruction', `${construction}: more than ${limit} states`);
		this.name = 'UnboundedConstruction';
	}
}
