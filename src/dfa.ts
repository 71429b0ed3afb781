import { MalformedDescription } from './errors';
import { Mealy, MealyEdge } from './mealy';
import { Moore } from './moore';
import { NFA } from './nfa';
import { regexToNFA } from './thompson';
import { Acceptor, EPSILON, Edge, letter, options, state, tracer, uniqueList, checkMember } from './types';

// acceptor outputs
export const ACCEPT = '1';
export const REJECT = '0';

export interface DFADescription {
	states:			readonly state[];
	alphabet:		readonly letter[];
	start:			state;
	finals:			readonly state[];
	transitions:	readonly Edge[];
}

//-----------------------------------------------------------------------------
//	Deterministic Finite Automaton (DFA)
//-----------------------------------------------------------------------------

export class DFA implements Acceptor {
	private constructor(
		readonly states:	readonly state[],
		readonly alphabet:	readonly letter[],
		readonly start:		state,
		readonly finals:	ReadonlySet<state>,
		private readonly table: ReadonlyMap<state, ReadonlyMap<letter, state>>
	) {}

	static from(d: DFADescription): DFA {
		const states	= uniqueList('state', d.states);
		const alphabet	= uniqueList('symbol', d.alphabet);
		if (alphabet.includes(EPSILON))
			throw new MalformedDescription('a DFA alphabet cannot contain the empty-string symbol');

		const known		= new Set(states);
		const symbols	= new Set(alphabet);

		const table = new Map<state, Map<letter, state>>();
		for (const {from, input, to} of d.transitions) {
			checkMember('state', known, from);
			checkMember('state', known, to);
			checkMember('symbol', symbols, input);

			let row = table.get(from);
			if (!row)
				table.set(from, row = new Map());

			const prev = row.get(input);
			if (prev !== undefined && prev !== to)
				throw new MalformedDescription(`nondeterministic transition on (${from}, ${input})`);
			row.set(input, to);
		}

		if (!known.has(d.start))
			throw new MalformedDescription(`start state '${d.start}' is not a state`);

		const finals = new Set(d.finals.map(s => checkMember('final state', known, s)));
		return new DFA(states, alphabet, d.start, finals, table);
	}

	// Subset Construction - convert NFA to DFA
	static fromNFA(nfa: NFA, opts: options = {}): DFA {
		const trace		= tracer('subset', opts);
		const alphabet	= nfa.inputs;
		const names		= new Map<string, state>();
		const states:	state[] = [];
		const finals	= new Set<state>();
		const table		= new Map<state, Map<letter, state>>();
		const worklist:	Set<state>[] = [];

		function intern(set: Set<state>): state {
			const key	= nfa.key(set);
			let name	= names.get(key);
			if (name === undefined) {
				name = `D${names.size}`;
				names.set(key, name);
				states.push(name);
				if (nfa.containsFinal(set))
					finals.add(name);
				worklist.push(set);
				trace.debug(`${name} = {${[...set].join(', ')}}`);
				trace.check(states.length);
			}
			return name;
		}

		intern(nfa.epsilonClosure([nfa.start]));

		for (let i = 0; i < worklist.length; i++) {
			const current	= worklist[i];
			const row		= new Map<letter, state>();
			table.set(states[i], row);

			for (const x of alphabet) {
				const targets = new Set<state>();
				for (const s of current) {
					for (const t of nfa.targets(s, x))
						targets.add(t);
				}
				if (targets.size > 0)
					row.set(x, intern(nfa.epsilonClosure(targets)));
			}
		}

		return new DFA(states, alphabet, states[0], finals, table);
	}

	static fromRegex(re: string, alphabet: readonly letter[], opts: options = {}): DFA {
		return this.fromNFA(regexToNFA(re, alphabet), opts);
	}

	next(from: state, input: letter): state | undefined {
		return this.table.get(from)?.get(input);
	}

	isFinal(s: state): boolean {
		return this.finals.has(s);
	}

	*edges(): Generator<Edge> {
		for (const from of this.states) {
			for (const input of this.alphabet) {
				const to = this.next(from, input);
				if (to !== undefined)
					yield {from, input, to};
			}
		}
	}

	// Output ACCEPT on every transition that lands in a final state
	toMealyAcceptor(): Mealy {
		const transitions: MealyEdge[] = [...this.edges()].map(e => ({...e, output: this.isFinal(e.to) ? ACCEPT : REJECT}));
		return Mealy.from({
			states:			this.states,
			inputs:			this.alphabet,
			outputs:		[REJECT, ACCEPT],
			start:			this.start,
			initialOutput:	REJECT,
			transitions,
		});
	}

	// Mark every final state ACCEPT
	toMooreAcceptor(): Moore {
		return Moore.from({
			states:			this.states,
			inputs:			this.alphabet,
			outputs:		[REJECT, ACCEPT],
			start:			this.start,
			marking:		Object.fromEntries(this.states.map(s => [s, this.isFinal(s) ? ACCEPT : REJECT])),
			transitions:	[...this.edges()],
		});
	}
}
