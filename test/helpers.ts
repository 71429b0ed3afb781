import { Acceptor, Mealy, Moore, NFA, letter } from '../src/index';

// Word simulation for the test suites; the library itself ships no run-time engine

export function accepts<S>(a: Acceptor<S>, word: Iterable<letter>): boolean {
	let s = a.start;
	for (const x of word) {
		const t = a.next(s, x);
		if (t === undefined)
			return false;
		s = t;
	}
	return a.isFinal(s);
}

export function nfaAccepts(nfa: NFA, word: Iterable<letter>): boolean {
	let current = nfa.epsilonClosure([nfa.start]);
	for (const x of word) {
		current = nfa.epsilonClosure([...current].flatMap(s => nfa.targets(s, x)));
		if (current.size === 0)
			return false;
	}
	return [...current].some(s => nfa.isFinal(s));
}

// Outputs produced along the word, undefined once a transition is missing
export function mealyRun(m: Mealy, word: Iterable<letter>): letter[] | undefined {
	const out: letter[] = [];
	let s = m.start;
	for (const x of word) {
		const t = m.transition(s, x);
		if (!t)
			return undefined;
		out.push(t.output);
		s = t.to;
	}
	return out;
}

// Markings of the states entered along the word
export function mooreRun(m: Moore, word: Iterable<letter>): letter[] | undefined {
	const out: letter[] = [];
	let s = m.start;
	for (const x of word) {
		const t = m.next(s, x);
		if (t === undefined)
			return undefined;
		const y = m.marking(t);
		if (y === undefined)
			return undefined;
		out.push(y);
		s = t;
	}
	return out;
}

// Every word over the alphabet up to maxLength, shortest first
export function words(alphabet: readonly letter[], maxLength: number): letter[][] {
	const result: letter[][] = [[]];
	let layer: letter[][] = [[]];
	for (let n = 0; n < maxLength; n++) {
		layer = layer.flatMap(w => alphabet.map(x => [...w, x]));
		result.push(...layer);
	}
	return result;
}

// Reproducible pseudo-random words (Park-Miller)
export function randomWords(alphabet: readonly letter[], count: number, length: number, seed = 1): letter[][] {
	let x = seed;
	const next = () => {
		x = (x * 48271) % 2147483647;
		return x;
	};
	return Array.from({length: count}, () => Array.from({length}, () => alphabet[next() % alphabet.length]));
}

// a0 -0/y0-> a1, a0 -1/y0-> a0, a1 -0/y1-> a1, a1 -1/y0-> a0
export function exampleMealy(): Mealy {
	return Mealy.from({
		states:		['a0', 'a1'],
		inputs:		['0', '1'],
		outputs:	['y0', 'y1'],
		start:		'a0',
		transitions: [
			{from: 'a0', input: '0', to: 'a1', output: 'y0'},
			{from: 'a0', input: '1', to: 'a0', output: 'y0'},
			{from: 'a1', input: '0', to: 'a1', output: 'y1'},
			{from: 'a1', input: '1', to: 'a0', output: 'y0'},
		],
	});
}
