import { DFA } from './dfa';
import { MalformedDescription } from './errors';
import { Acceptor, Edge, letter, options, tracer } from './types';

const DEFAULT_VARIABLES = ['x', 'y', 'z', 'u'];
const DEFAULT_MAX_STATES = 1 << 16;

export interface LinearOptions extends options {
	/** Variable names, one per coefficient */
	variables?: readonly string[];
}

//-----------------------------------------------------------------------------
//	Acceptor for a linear equation a·x = b
//-----------------------------------------------------------------------------

/**
 * Reads the solutions of a·x = b least significant bit first: each symbol is a bit vector
 * with one bit per variable (variable 0 leftmost), and a state is the value still owed.
 */
export class LinearAutomaton implements Acceptor<number> {
	readonly alphabet:	readonly letter[];
	readonly finals:	ReadonlySet<number>;

	constructor(
		readonly coefficients:	readonly number[],
		readonly target:		number,
		readonly variables:		readonly string[],
		readonly states:		readonly number[],
		private readonly table: ReadonlyMap<number, ReadonlyMap<letter, number>>
	) {
		this.alphabet	= bitVectors(coefficients.length);
		this.finals		= new Set(states.filter(s => s === 0));
	}

	get start(): number {
		return this.target;
	}

	next(from: number, input: letter): number | undefined {
		return this.table.get(from)?.get(input);
	}

	isFinal(s: number): boolean {
		return this.finals.has(s);
	}

	vector(input: letter): number[] {
		return [...input].map(b => b === '1' ? 1 : 0);
	}

	*edges(): Generator<Edge<number>> {
		for (const from of this.states) {
			for (const input of this.alphabet) {
				const to = this.next(from, input);
				if (to !== undefined)
					yield {from, input, to};
			}
		}
	}

	// Residuals become decimal state names
	toDFA(): DFA {
		return DFA.from({
			states:			this.states.map(String),
			alphabet:		this.alphabet,
			start:			String(this.start),
			finals:			[...this.finals].map(String),
			transitions:	[...this.edges()].map(e => ({from: String(e.from), input: e.input, to: String(e.to)})),
		});
	}
}

// all 2^q vectors, (0..0) first
export function bitVectors(q: number): letter[] {
	return Array.from({length: 2 ** q}, (_, i) => i.toString(2).padStart(q, '0'));
}

export function linearAutomaton(coefficients: readonly number[], target: number, opts: LinearOptions = {}): LinearAutomaton {
	const q = coefficients.length;
	if (q === 0)
		throw new MalformedDescription('at least one coefficient is required');
	if (![...coefficients, target].every(Number.isSafeInteger))
		throw new MalformedDescription('coefficients and target must be integers');

	const variables = opts.variables ?? (q <= DEFAULT_VARIABLES.length ? DEFAULT_VARIABLES.slice(0, q) : Array.from({length: q}, (_, i) => `z${i}`));
	if (variables.length !== q)
		throw new MalformedDescription(`expected ${q} variable names, got ${variables.length}`);

	const trace		= tracer('linear', opts, DEFAULT_MAX_STATES);
	const alphabet	= bitVectors(q);
	const sums		= alphabet.map(z => [...z].reduce((sum, b, i) => b === '1' ? sum + coefficients[i] : sum, 0));

	const states:	number[] = [target];
	const seen		= new Set(states);
	const table		= new Map<number, Map<letter, number>>();

	trace.debug(`a=[${coefficients.join(', ')}], b=${target}, ${alphabet.length} symbols`);

	for (let i = 0; i < states.length; i++) {
		const s		= states[i];
		const row	= new Map<letter, number>();
		table.set(s, row);

		alphabet.forEach((z, k) => {
			const rest = s - sums[k];
			if (rest % 2 === 0) {
				const j = rest / 2;
				row.set(z, j);
				if (!seen.has(j)) {
					seen.add(j);
					states.push(j);
					trace.debug(`new state ${j}`);
					trace.check(states.length);
				}
			}
		});
	}

	return new LinearAutomaton([...coefficients], target, [...variables], states, table);
}
