import { Mealy, MealyEdge } from './mealy';
import { Moore } from './moore';
import { Edge, Tracer, letter, options, state, tracer } from './types';

export interface MinimizeOptions extends Pick<options, 'debug' | 'logger'> {
	/** Drop states unreachable from the start state before refining (default: false) */
	prune?: boolean;
}

interface Machine {
	readonly states:	readonly state[];
	readonly inputs:	readonly letter[];
	readonly start:		state;
	next(from: state, input: letter): state | undefined;
}

//-----------------------------------------------------------------------------
//	Partition refinement
//-----------------------------------------------------------------------------

function group(states: readonly state[], key: (s: state) => string): state[][] {
	const groups = new Map<string, state[]>();
	for (const s of states) {
		const k = key(s);
		const g = groups.get(k);
		if (g)
			g.push(s);
		else
			groups.set(k, [s]);
	}
	return [...groups.values()];
}

function reachable(m: Machine): state[] {
	const seen	= new Set([m.start]);
	const stack	= [m.start];
	while (stack.length > 0) {
		const s = stack.pop()!;
		for (const x of m.inputs) {
			const t = m.next(s, x);
			if (t !== undefined && !seen.has(t)) {
				seen.add(t);
				stack.push(t);
			}
		}
	}
	return m.states.filter(s => seen.has(s));
}

/**
 * Split classes until every member of a class sends each input to the same class.
 * Returns the final classes, each in discovery order; the first member is the representative.
 */
function refine(m: Machine, states: readonly state[], initial: (s: state) => string, trace: Tracer): state[][] {
	let classes = group(states, initial);
	trace.debug(`initial partition: ${classes.length} classes`);

	for (let changed = true; changed;) {
		const classOf = new Map<state, number>();
		classes.forEach((c, i) => c.forEach(s => classOf.set(s, i)));

		changed = false;
		const refined: state[][] = [];
		for (const c of classes) {
			const parts = group(c, s => m.inputs.map(x => {
				const t = m.next(s, x);
				return t === undefined ? -1 : classOf.get(t) ?? -1;
			}).join(','));

			if (parts.length > 1)
				changed = true;
			refined.push(...parts);
		}
		classes = refined;
		trace.debug(`refined: ${classes.length} classes`);
	}
	return classes;
}

function representatives(classes: state[][]): Map<state, state> {
	const rep = new Map<state, state>();
	for (const c of classes)
		c.forEach(s => rep.set(s, c[0]));
	return rep;
}

//-----------------------------------------------------------------------------
//	Moore
//-----------------------------------------------------------------------------

export function minimizeMoore(moore: Moore, opts: MinimizeOptions = {}): Moore {
	const trace		= tracer('minimize', opts);
	const states	= opts.prune ? reachable(moore) : moore.states;
	const classes	= refine(moore, states, s => moore.marking(s) ?? '', trace);
	const rep		= representatives(classes);
	const kept		= classes.map(c => c[0]);

	const marking:		[state, letter][] = [];
	const transitions:	Edge[] = [];
	for (const from of kept) {
		marking.push([from, moore.marking(from) ?? moore.outputs[0]]);
		for (const input of moore.inputs) {
			const to = moore.next(from, input);
			if (to !== undefined)
				transitions.push({from, input, to: rep.get(to) ?? to});
		}
	}

	return Moore.from({
		states:		kept,
		inputs:		moore.inputs,
		outputs:	moore.outputs,
		start:		rep.get(moore.start) ?? moore.start,
		marking:	Object.fromEntries(marking),
		transitions,
	});
}

//-----------------------------------------------------------------------------
//	Mealy
//-----------------------------------------------------------------------------

export function minimizeMealy(mealy: Mealy, opts: MinimizeOptions = {}): Mealy {
	const trace	= tracer('minimize', opts);
	const m: Machine = {
		states:	mealy.states,
		inputs:	mealy.inputs,
		start:	mealy.start,
		next:	(from, input) => mealy.transition(from, input)?.to,
	};

	// initial classes: per-input output vector, null where undefined
	const outputs	= (s: state) => JSON.stringify(mealy.inputs.map(x => mealy.transition(s, x)?.output ?? null));
	const states	= opts.prune ? reachable(m) : mealy.states;
	const classes	= refine(m, states, outputs, trace);
	const rep		= representatives(classes);
	const kept		= classes.map(c => c[0]);

	const transitions: MealyEdge[] = [];
	for (const from of kept) {
		for (const input of mealy.inputs) {
			const t = mealy.transition(from, input);
			if (t)
				transitions.push({from, input, to: rep.get(t.to) ?? t.to, output: t.output});
		}
	}

	return Mealy.from({
		states:			kept,
		inputs:			mealy.inputs,
		outputs:		mealy.outputs,
		start:			rep.get(mealy.start) ?? mealy.start,
		initialOutput:	mealy.initialOutput,
		transitions,
	});
}
