import { DFA } from './dfa';
import { EmptyNetwork } from './errors';
import { Acceptor, Edge, escapeName, letter, options, state, tracer } from './types';

//-----------------------------------------------------------------------------
//	Asynchronous product of an automaton network
//-----------------------------------------------------------------------------

export function tupleName(tuple: readonly unknown[]): state {
	return `(${tuple.map(s => escapeName(String(s))).join(',')})`;
}

/**
 * Interleaved composition over the union of the members' alphabets.
 * A symbol moves every member that owns it (all of them must have a transition, or there is none)
 * and leaves the others where they are.
 */
export function asyncProduct(network: readonly Acceptor<unknown>[], opts: options = {}): DFA {
	if (network.length < 2)
		throw new EmptyNetwork(network.length);

	const trace		= tracer('product', opts);
	const alphabet	= [...new Set(network.flatMap(a => a.alphabet))];
	const owns		= network.map(a => new Set<letter>(a.alphabet));

	const names		= new Map<string, state>();
	const tuples:	unknown[][] = [];
	const states:	state[]	= [];
	const finals:	state[]	= [];
	const transitions: Edge[] = [];

	function intern(tuple: unknown[]): state {
		const key	= JSON.stringify(tuple.map(String));
		let name	= names.get(key);
		if (name === undefined) {
			name = tupleName(tuple);
			names.set(key, name);
			tuples.push(tuple);
			states.push(name);
			if (network.every((a, i) => a.isFinal(tuple[i])))
				finals.push(name);
			trace.debug(`new state ${name}`);
			trace.check(states.length);
		}
		return name;
	}

	intern(network.map(a => a.start));

	for (let t = 0; t < tuples.length; t++) {
		const current = tuples[t];

		for (const x of alphabet) {
			const next: unknown[] = [];
			let defined = true;

			for (let i = 0; defined && i < network.length; i++) {
				if (owns[i].has(x)) {
					const to = network[i].next(current[i], x);
					if (to === undefined)
						defined = false;
					next.push(to);
				} else {
					next.push(current[i]);
				}
			}

			if (defined)
				transitions.push({from: states[t], input: x, to: intern(next)});
		}
	}

	return DFA.from({states, alphabet, start: states[0], finals, transitions});
}
