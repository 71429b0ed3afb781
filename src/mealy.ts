import { MalformedDescription } from './errors';
import { Edge, letter, state, uniqueList, checkMember } from './types';

//-----------------------------------------------------------------------------
//	Mealy machine: output on transitions
//-----------------------------------------------------------------------------

export interface MealyTransition {
	to:		state;
	output:	letter;
}

export interface MealyEdge extends Edge {
	output:	letter;
}

export interface MealyDescription {
	states:			readonly state[];
	inputs:			readonly letter[];
	outputs:		readonly letter[];
	start:			state;
	initialOutput?:	letter;		// defaults to the first output
	transitions:	readonly MealyEdge[];
}

export class Mealy {
	private constructor(
		readonly states:		readonly state[],
		readonly inputs:		readonly letter[],
		readonly outputs:		readonly letter[],
		readonly start:			state,
		readonly initialOutput:	letter,
		private readonly table: ReadonlyMap<state, ReadonlyMap<letter, MealyTransition>>
	) {}

	static from(d: MealyDescription): Mealy {
		const states	= uniqueList('state', d.states);
		const inputs	= uniqueList('input', d.inputs);
		const outputs	= uniqueList('output', d.outputs);
		if (outputs.length === 0)
			throw new MalformedDescription('output alphabet is empty');

		const known		= new Set(states);
		const symbols	= new Set(inputs);
		const produced	= new Set(outputs);

		const table = new Map<state, Map<letter, MealyTransition>>();
		for (const {from, input, to, output} of d.transitions) {
			checkMember('state', known, from);
			checkMember('state', known, to);
			checkMember('input', symbols, input);
			checkMember('output', produced, output);

			let row = table.get(from);
			if (!row)
				table.set(from, row = new Map());

			const prev = row.get(input);
			if (prev && (prev.to !== to || prev.output !== output))
				throw new MalformedDescription(`conflicting transitions for (${from}, ${input})`);
			row.set(input, {to, output});
		}

		if (!known.has(d.start))
			throw new MalformedDescription(`start state '${d.start}' is not a state`);

		const initialOutput = checkMember('output', produced, d.initialOutput ?? outputs[0]);
		return new Mealy(states, inputs, outputs, d.start, initialOutput, table);
	}

	transition(from: state, input: letter): MealyTransition | undefined {
		return this.table.get(from)?.get(input);
	}

	*edges(): Generator<MealyEdge> {
		for (const from of this.states) {
			for (const input of this.inputs) {
				const t = this.transition(from, input);
				if (t)
					yield {from, input, to: t.to, output: t.output};
			}
		}
	}
}
