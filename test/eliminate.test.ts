import { describe, test, expect } from 'vitest';
import { DFA, empty, eliminate, toRegex, linearAutomaton, mealyAcceptor, parseMealy } from '../src/index';
import { accepts, words } from './helpers';

describe('state elimination', () => {
	test('no final states', () => {
		const dfa = DFA.from({states: ['p'], alphabet: ['a'], start: 'p', finals: [], transitions: [{from: 'p', input: 'a', to: 'p'}]});
		expect(eliminate(dfa)).toBe(empty);
		expect(toRegex(dfa)).toBe('∅');
	});

	test('single symbol', () => {
		const dfa = DFA.from({states: ['p', 'q'], alphabet: ['a'], start: 'p', finals: ['q'], transitions: [{from: 'p', input: 'a', to: 'q'}]});
		expect(toRegex(dfa)).toBe('a');
	});

	test('empty string', () => {
		const dfa = DFA.from({states: ['p'], alphabet: ['a'], start: 'p', finals: ['p'], transitions: []});
		expect(toRegex(dfa)).toBe('ε');
	});

	test('self loop', () => {
		const dfa = DFA.from({states: ['p'], alphabet: ['a'], start: 'p', finals: ['p'], transitions: [{from: 'p', input: 'a', to: 'p'}]});
		expect(toRegex(dfa)).toBe('a*');
	});

	test('regex round trip keeps the language', () => {
		const alphabet = ['a', 'b'];
		for (const re of ['(a|b)*ab', 'a*b|ba*', '(ab|b)*', 'a(b|ε)a*', '∅|a', '∅', '(aa|bb)*(ab|ba)']) {
			const original	= DFA.fromRegex(re, alphabet);
			const extracted	= toRegex(original);
			const again		= DFA.fromRegex(extracted, alphabet);
			for (const w of words(alphabet, 6))
				expect(accepts(again, w), `${re} -> ${extracted} on '${w.join('')}'`).toBe(accepts(original, w));
		}
	});

	test('numeric states', () => {
		// x = 0: any number of zero bits
		expect(toRegex(linearAutomaton([1], 0))).toBe('0*');
	});

	test('output machine read as an acceptor', () => {
		const mealy = parseMealy(`
			STATES: a0, a1
			INPUTS: 0, 1
			OUTPUTS: y0, y1
			START_STATE: a0
			TRANSITIONS:
			a0, 0: a1/y0
			a0, 1: a0/y0
			a1, 0: a1/y1
			a1, 1: a0/y0
		`);
		const acceptor	= mealyAcceptor(mealy, 'y1');
		const again		= DFA.fromRegex(toRegex(acceptor), ['0', '1']);
		for (const w of words(['0', '1'], 6))
			expect(accepts(again, w), w.join('')).toBe(accepts(acceptor, w));
	});
});
