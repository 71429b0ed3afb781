import { describe, test, expect } from 'vitest';
import { preprocess, toPostfix, MalformedDescription } from '../src/index';

describe('preprocess', () => {
	test('inserts concatenation', () => {
		expect(preprocess('ab')).toBe('a.b');
		expect(preprocess('(a|b)*ab')).toBe('(a|b)*.a.b');
		expect(preprocess('a(b)')).toBe('a.(b)');
		expect(preprocess('(a)(b)')).toBe('(a).(b)');
		expect(preprocess('a*b*')).toBe('a*.b*');
		expect(preprocess('aε')).toBe('a.ε');
	});

	test('leaves operators alone', () => {
		expect(preprocess('a|b')).toBe('a|b');
		expect(preprocess('a.b')).toBe('a.b');
		expect(preprocess('a**')).toBe('a**');
		expect(preprocess('')).toBe('');
	});
});

describe('toPostfix', () => {
	test('precedence', () => {
		expect(toPostfix('(a|b)*ab')).toBe('ab|*a.b.');
		expect(toPostfix('a|bc')).toBe('abc.|');
		expect(toPostfix('ab*')).toBe('ab*.');
		expect(toPostfix('a|b|c')).toBe('ab|c|');
	});

	test('unbalanced parentheses', () => {
		expect(() => toPostfix('(ab')).toThrow(MalformedDescription);
		expect(() => toPostfix('ab)')).toThrow("unmatched ')'");
	});
});
