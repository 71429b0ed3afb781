import { Mealy, MealyEdge } from './mealy';
import { Moore } from './moore';
import { Acceptor, Edge, escapeName, letter, state } from './types';

//-----------------------------------------------------------------------------
//	Mealy <-> Moore
//-----------------------------------------------------------------------------

export function pairName(s: state, y: letter): state {
	return `${escapeName(s)}/${escapeName(y)}`;
}

/**
 * Every (state, output) pair becomes a Moore state marked with its output, whether or not it is
 * reachable from the new start state (start, initialOutput). Minimization merges the surplus.
 */
export function mealyToMoore(mealy: Mealy): Moore {
	const states:		state[] = [];
	const marking:		[state, letter][] = [];
	const transitions:	Edge[] = [];

	for (const a of mealy.states) {
		for (const y of mealy.outputs) {
			const from = pairName(a, y);
			states.push(from);
			marking.push([from, y]);

			for (const input of mealy.inputs) {
				const t = mealy.transition(a, input);
				if (t)
					transitions.push({from, input, to: pairName(t.to, t.output)});
			}
		}
	}

	return Moore.from({
		states,
		inputs:		mealy.inputs,
		outputs:	mealy.outputs,
		start:		pairName(mealy.start, mealy.initialOutput),
		marking:	Object.fromEntries(marking),
		transitions,
	});
}

// Each transition outputs the marking of the state it lands in
export function mooreToMealy(moore: Moore): Mealy {
	const transitions: MealyEdge[] = [];
	for (const e of moore.edges()) {
		const output = moore.marking(e.to);
		if (output !== undefined)
			transitions.push({...e, output});
	}

	return Mealy.from({
		states:			moore.states,
		inputs:			moore.inputs,
		outputs:		moore.outputs,
		start:			moore.start,
		initialOutput:	moore.outputs[0],
		transitions,
	});
}

// A Mealy machine read as an acceptor: a word is accepted when its last output is `accepting`
export function mealyAcceptor(mealy: Mealy, accepting: letter): Acceptor {
	return mealyToMoore(mealy).asAcceptor(accepting);
}
