import { MalformedDescription } from './errors';
import { NFA } from './nfa';
import { toPostfix, reserved, EMPTY, UNION, CONCAT, STAR } from './parse';
import { EPSILON, Edge, letter, state } from './types';

interface Fragment {
	start:	state;
	finals:	state[];
}

//-----------------------------------------------------------------------------
// Thompson NFA
//-----------------------------------------------------------------------------

export class ThompsonBuilder {
	readonly alphabet: readonly letter[];

	// per-build arena
	private nextId	= 0;
	private states:	state[]	= [];
	private edges:	Edge[]	= [];

	constructor(alphabet: readonly letter[]) {
		for (const x of alphabet) {
			if ([...x].length !== 1)
				throw new MalformedDescription(`regex symbol '${x}' must be a single character`);
			if (reserved.has(x) || x === EPSILON || x === EMPTY)
				throw new MalformedDescription(`regex symbol '${x}' is reserved`);
		}
		this.alphabet = [...new Set(alphabet)];
	}

	private newState(): state {
		const s = `s${this.nextId++}`;
		this.states.push(s);
		return s;
	}

	private link(from: state, input: letter, to: state) {
		this.edges.push({from, input, to});
	}

	private atom(input: letter): Fragment {
		const start	= this.newState();
		const end	= this.newState();
		this.link(start, input, end);
		return {start, finals: [end]};
	}

	private nothing(): Fragment {
		const start	= this.newState();
		return {start, finals: [this.newState()]};
	}

	private union(a: Fragment, b: Fragment): Fragment {
		const start	= this.newState();
		const end	= this.newState();
		this.link(start, EPSILON, a.start);
		this.link(start, EPSILON, b.start);
		for (const f of [...a.finals, ...b.finals])
			this.link(f, EPSILON, end);
		return {start, finals: [end]};
	}

	private concat(a: Fragment, b: Fragment): Fragment {
		for (const f of a.finals)
			this.link(f, EPSILON, b.start);
		return {start: a.start, finals: b.finals};
	}

	private star(a: Fragment): Fragment {
		const start	= this.newState();
		const end	= this.newState();
		this.link(start, EPSILON, a.start);
		this.link(start, EPSILON, end);
		for (const f of a.finals) {
			this.link(f, EPSILON, a.start);
			this.link(f, EPSILON, end);
		}
		return {start, finals: [end]};
	}

	build(postfix: string): NFA {
		this.nextId	= 0;
		this.states	= [];
		this.edges	= [];

		const terminals = new Set(this.alphabet);
		const stack: Fragment[] = [];

		const pop = (op: string) => {
			const frag = stack.pop();
			if (!frag)
				throw new MalformedDescription(`operator '${op}' is missing an operand in '${postfix}'`);
			return frag;
		};

		for (const c of postfix) {
			if (terminals.has(c)) {
				stack.push(this.atom(c));

			} else if (c === EPSILON) {
				stack.push(this.atom(EPSILON));

			} else if (c === EMPTY) {
				stack.push(this.nothing());

			} else if (c === UNION || c === CONCAT) {
				const b = pop(c);
				const a = pop(c);
				stack.push(c === UNION ? this.union(a, b) : this.concat(a, b));

			} else if (c === STAR) {
				stack.push(this.star(pop(c)));

			} else {
				throw new MalformedDescription(`unknown symbol '${c}' in '${postfix}'`);
			}
		}

		if (stack.length !== 1)
			throw new MalformedDescription(stack.length === 0 ? 'empty regular expression' : `unconnected subexpressions in '${postfix}'`);

		const [result] = stack;
		return NFA.from({
			states:			this.states,
			alphabet:		[...this.alphabet, EPSILON],
			start:			result.start,
			finals:			result.finals,
			transitions:	this.edges,
		});
	}
}

export function regexToNFA(re: string, alphabet: readonly letter[]): NFA {
	return new ThompsonBuilder(alphabet).build(toPostfix(re));
}
