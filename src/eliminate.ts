import { MalformedDescription } from './errors';
import { part, empty, epsilon, alternation, concatenation, star, toString } from './regex';
import { Acceptor } from './types';

//-----------------------------------------------------------------------------
//	State elimination: acceptor -> regular expression
//-----------------------------------------------------------------------------

/**
 * Builds the transition-regex matrix over the acceptor's states plus a synthetic start and final,
 * then removes the real states in declaration order.
 * The result is one regex for the language; its text depends on the elimination order.
 */
export function eliminate<S>(a: Acceptor<S>): part {
	if (!a.states.some(s => a.isFinal(s)))
		return empty;

	const n		= a.states.length;
	const START	= n;
	const FINAL	= n + 1;

	const index = new Map<S, number>();
	a.states.forEach((s, i) => index.set(s, i));

	const start = index.get(a.start);
	if (start === undefined)
		throw new MalformedDescription(`start state '${String(a.start)}' is not a state`);

	const R: part[][] = Array.from({length: n + 2}, (_, i) =>
		Array.from({length: n + 2}, (_, j) => i === j ? epsilon : empty)
	);

	a.states.forEach((s, i) => {
		for (const x of a.alphabet) {
			const t = a.next(s, x);
			const j = t === undefined ? undefined : index.get(t);
			if (j !== undefined)
				R[i][j] = alternation(R[i][j], x);
		}
	});

	R[START][start] = epsilon;
	a.states.forEach((s, i) => {
		if (a.isFinal(s))
			R[i][FINAL] = epsilon;
	});

	let remaining = Array.from({length: n + 2}, (_, i) => i);
	for (let k = 0; k < n; k++) {
		remaining = remaining.filter(i => i !== k);
		const loop = star(R[k][k]);

		for (const i of remaining) {
			if (R[i][k] === empty)
				continue;
			for (const j of remaining) {
				if (R[k][j] !== empty)
					R[i][j] = alternation(R[i][j], concatenation(R[i][k], loop, R[k][j]));
			}
		}
	}

	return R[START][FINAL];
}

export function toRegex<S>(a: Acceptor<S>): string {
	return toString(eliminate(a));
}
