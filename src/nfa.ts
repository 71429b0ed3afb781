import { bits } from '@isopodlabs/utilities';
import { MalformedDescription } from './errors';
import { EPSILON, Edge, letter, state, uniqueList, checkMember } from './types';

type SparseBits = bits.SparseBits;
const { SparseBits } = bits;

//-----------------------------------------------------------------------------
//	Nondeterministic Finite Automaton (NFA)
//-----------------------------------------------------------------------------

export interface NFADescription {
	states:			readonly state[];
	alphabet:		readonly letter[];	// EPSILON is implied
	start:			state;
	finals:			readonly state[];
	transitions:	readonly Edge[];
}

export class NFA {
	private readonly index		= new Map<state, number>();
	private readonly finalBits:	SparseBits;

	private constructor(
		readonly states:	readonly state[],
		readonly alphabet:	readonly letter[],
		readonly start:		state,
		readonly finals:	ReadonlySet<state>,
		private readonly table: ReadonlyMap<state, ReadonlyMap<letter, readonly state[]>>
	) {
		states.forEach((s, i) => this.index.set(s, i));
		this.finalBits = this.bitsOf(finals);
	}

	static from(d: NFADescription): NFA {
		const states	= uniqueList('state', d.states);
		const known		= new Set(states);
		const alphabet	= uniqueList('symbol', d.alphabet.includes(EPSILON) ? d.alphabet : [...d.alphabet, EPSILON]);
		const symbols	= new Set(alphabet);

		const table = new Map<state, Map<letter, state[]>>();
		for (const {from, input, to} of d.transitions) {
			checkMember('state', known, from);
			checkMember('state', known, to);
			checkMember('symbol', symbols, input);
			let row = table.get(from);
			if (!row)
				table.set(from, row = new Map());
			let targets = row.get(input);
			if (!targets)
				row.set(input, targets = []);
			if (!targets.includes(to))
				targets.push(to);
		}

		if (!known.has(d.start))
			throw new MalformedDescription(`start state '${d.start}' is not a state`);

		const finals = new Set(d.finals.map(s => checkMember('final state', known, s)));
		return new NFA(states, alphabet, d.start, finals, table);
	}

	/** Symbols other than EPSILON, in declaration order */
	get inputs(): letter[] {
		return this.alphabet.filter(x => x !== EPSILON);
	}

	targets(from: state, input: letter): readonly state[] {
		return this.table.get(from)?.get(input) ?? [];
	}

	isFinal(s: state): boolean {
		return this.finals.has(s);
	}

	// Smallest superset of states closed under ε-transitions
	epsilonClosure(states: Iterable<state>): Set<state> {
		const closure	= new Set(states);
		const stack		= [...closure];

		while (stack.length > 0) {
			const s = stack.pop()!;
			for (const next of this.targets(s, EPSILON)) {
				if (!closure.has(next)) {
					closure.add(next);
					stack.push(next);
				}
			}
		}
		return closure;
	}

	bitsOf(states: Iterable<state>): SparseBits {
		const indices: number[] = [];
		for (const s of states) {
			const i = this.index.get(s);
			if (i !== undefined)
				indices.push(i);
		}
		return SparseBits.fromIndices(...indices);
	}

	containsFinal(states: Iterable<state>): boolean {
		return !this.bitsOf(states).intersect(this.finalBits).empty();
	}

	// Canonical key for a set of states, independent of iteration order
	key(states: Iterable<state>): string {
		return [...states].map(s => this.index.get(s) ?? -1).sort((a, b) => a - b).join(',');
	}

	*edges(): Generator<Edge> {
		for (const from of this.states) {
			for (const input of this.alphabet) {
				for (const to of this.targets(from, input))
					yield {from, input, to};
			}
		}
	}
}
