import { MalformedDescription } from './errors';
import { Acceptor, Edge, letter, state, uniqueList, checkMember } from './types';

//-----------------------------------------------------------------------------
//	Moore machine: output on states
//-----------------------------------------------------------------------------

export interface MooreDescription {
	states:			readonly state[];
	inputs:			readonly letter[];
	outputs:		readonly letter[];
	start:			state;
	marking?:		Readonly<Record<state, letter>>;	// omitted: every state gets the first output
	transitions:	readonly Edge[];
}

export class Moore {
	private constructor(
		readonly states:	readonly state[],
		readonly inputs:	readonly letter[],
		readonly outputs:	readonly letter[],
		readonly start:		state,
		private readonly marks: ReadonlyMap<state, letter>,
		private readonly table: ReadonlyMap<state, ReadonlyMap<letter, state>>
	) {}

	static from(d: MooreDescription): Moore {
		const states	= uniqueList('state', d.states);
		const inputs	= uniqueList('input', d.inputs);
		const outputs	= uniqueList('output', d.outputs);
		if (outputs.length === 0)
			throw new MalformedDescription('output alphabet is empty');

		const known		= new Set(states);
		const symbols	= new Set(inputs);
		const produced	= new Set(outputs);

		const table = new Map<state, Map<letter, state>>();
		for (const {from, input, to} of d.transitions) {
			checkMember('state', known, from);
			checkMember('state', known, to);
			checkMember('input', symbols, input);

			let row = table.get(from);
			if (!row)
				table.set(from, row = new Map());

			const prev = row.get(input);
			if (prev !== undefined && prev !== to)
				throw new MalformedDescription(`conflicting transitions for (${from}, ${input})`);
			row.set(input, to);
		}

		if (!known.has(d.start))
			throw new MalformedDescription(`start state '${d.start}' is not a state`);

		const marks = new Map<state, letter>();
		if (!d.marking || Object.keys(d.marking).length === 0) {
			for (const s of states)
				marks.set(s, outputs[0]);
		} else {
			for (const [s, y] of Object.entries(d.marking))
				marks.set(checkMember('marked state', known, s), checkMember('output', produced, y));
			const missing = states.find(s => !marks.has(s));
			if (missing !== undefined)
				throw new MalformedDescription(`state '${missing}' has no marking`);
		}

		return new Moore(states, inputs, outputs, d.start, marks, table);
	}

	next(from: state, input: letter): state | undefined {
		return this.table.get(from)?.get(input);
	}

	marking(s: state): letter | undefined {
		return this.marks.get(s);
	}

	*edges(): Generator<Edge> {
		for (const from of this.states) {
			for (const input of this.inputs) {
				const to = this.next(from, input);
				if (to !== undefined)
					yield {from, input, to};
			}
		}
	}

	// Acceptor view: a state is final when its marking is the accepting output
	asAcceptor(accepting: letter): Acceptor {
		return {
			states:		this.states,
			alphabet:	this.inputs,
			start:		this.start,
			next:		(from, input) => this.next(from, input),
			isFinal:	s => this.marks.get(s) === accepting,
		};
	}
}
