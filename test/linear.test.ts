import { describe, test, expect, vi } from 'vitest';
import { linearAutomaton, bitVectors, MalformedDescription, UnboundedConstruction } from '../src/index';
import { accepts, words } from './helpers';

// x + 2y + z - 3u = 1
const a = [1, 2, 1, -3];
const b = 1;

describe('linearAutomaton', () => {
	test('alphabet is every bit vector', () => {
		expect(bitVectors(2)).toEqual(['00', '01', '10', '11']);
		const automaton = linearAutomaton(a, b);
		expect(automaton.alphabet).toHaveLength(16);
		expect(automaton.alphabet[0]).toBe('0000');
		expect(automaton.alphabet[15]).toBe('1111');
		expect(automaton.vector('0101')).toEqual([0, 1, 0, 1]);
	});

	test('residual transitions', () => {
		const automaton = linearAutomaton(a, b);
		expect(automaton.start).toBe(1);
		expect(automaton.states[0]).toBe(1);
		expect(automaton.next(1, '1000')).toBe(0);
		expect(automaton.next(1, '0001')).toBe(2);
		expect(automaton.next(2, '0100')).toBe(0);
		expect(automaton.next(0, '0000')).toBe(0);
		expect(automaton.next(1, '0000')).toBeUndefined();
	});

	test('zero is the only final state', () => {
		const automaton = linearAutomaton(a, b);
		expect(automaton.states).toContain(0);
		expect([...automaton.finals]).toEqual([0]);
		expect(automaton.states.filter(s => automaton.isFinal(s))).toEqual([0]);
	});

	test('every transition halves the residual', () => {
		const automaton = linearAutomaton(a, b);
		for (const {from, input, to} of automaton.edges()) {
			const sum = automaton.vector(input).reduce((acc, bit, i) => acc + bit * a[i], 0);
			expect(from - sum).toBe(2 * to);
		}
	});

	test('accepts exactly the solutions', () => {
		const automaton = linearAutomaton(a, b);
		expect(accepts(automaton, ['0001', '0100'])).toBe(true);
		for (const w of words(automaton.alphabet, 3)) {
			const value = w.reduce((acc, z, k) => acc + automaton.vector(z).reduce((s, bit, i) => s + bit * a[i], 0) * 2 ** k, 0);
			expect(accepts(automaton, w), w.join(' ')).toBe(value === b);
		}
	});

	test('unreachable zero', () => {
		// 2x = 1 has no solution
		const automaton = linearAutomaton([2], 1);
		expect(automaton.states).toEqual([1]);
		expect(automaton.finals.size).toBe(0);
	});

	test('variable names', () => {
		expect(linearAutomaton(a, b).variables).toEqual(['x', 'y', 'z', 'u']);
		expect(linearAutomaton([1, 1], 0).variables).toEqual(['x', 'y']);
		expect(linearAutomaton([1, 1, 1, 1, 1], 0).variables).toEqual(['z0', 'z1', 'z2', 'z3', 'z4']);
		expect(linearAutomaton([1, 1], 0, {variables: ['m', 'n']}).variables).toEqual(['m', 'n']);
	});

	test('invalid equations', () => {
		expect(() => linearAutomaton([], 1)).toThrow(MalformedDescription);
		expect(() => linearAutomaton([1.5], 1)).toThrow('coefficients and target must be integers');
		expect(() => linearAutomaton([1, 1], 0, {variables: ['x']})).toThrow('expected 2 variable names, got 1');
	});

	test('state cap', () => {
		const warn = vi.fn((..._args: unknown[]) => '');
		const logger = {debug: warn, warn};
		expect(() => linearAutomaton(a, b, {maxStates: 1, logger})).toThrow(UnboundedConstruction);
		expect(warn).toHaveBeenCalledWith('[linear]', 'state cap of 1 exceeded');
	});

	test('as a DFA', () => {
		const dfa = linearAutomaton(a, b).toDFA();
		expect(dfa.start).toBe('1');
		expect(dfa.isFinal('0')).toBe(true);
		expect(dfa.next('1', '1000')).toBe('0');
		expect(accepts(dfa, ['0001', '0100'])).toBe(true);
	});
});
