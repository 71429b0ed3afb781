import { MalformedDescription } from './errors';

/*
Regular expression syntax

x			Symbol from the alphabet (a single character)
ε			The empty string
∅			The empty language
xy			Concatenation (made explicit as x.y by preprocess)
x|y			Union
x*			Kleene star
(x)			Grouping

Precedence: * > . > |
*/

export const UNION	= '|';
export const CONCAT	= '.';
export const STAR	= '*';
export const OPEN	= '(';
export const CLOSE	= ')';
export const EMPTY	= '∅';

const precedence: Record<string, number> = {
	[UNION]:	1,
	[CONCAT]:	2,
	[STAR]:		3,
};

export const reserved = new Set([UNION, CONCAT, STAR, OPEN, CLOSE]);

// Nothing is inserted before these
const noConcatBefore = new Set([UNION, STAR, CLOSE, CONCAT]);

//-----------------------------------------------------------------------------
// Regex parsing
//-----------------------------------------------------------------------------

// Insert explicit concatenation between implicitly adjacent expressions
export function preprocess(re: string): string {
	const chars = [...re];
	let result	= '';

	for (let i = 0; i < chars.length; i++) {
		const c = chars[i];
		result += c;

		if (i + 1 < chars.length && c !== OPEN && c !== UNION && c !== CONCAT && !noConcatBefore.has(chars[i + 1]))
			result += CONCAT;
	}
	return result;
}

// Shunting-yard conversion of the preprocessed expression
export function toPostfix(re: string): string {
	const stack:	string[] = [];
	let output		= '';

	for (const c of preprocess(re)) {
		if (c === OPEN) {
			stack.push(c);

		} else if (c === CLOSE) {
			while (stack.length > 0 && stack[stack.length - 1] !== OPEN)
				output += stack.pop();
			if (stack.pop() !== OPEN)
				throw new MalformedDescription(`unmatched '${CLOSE}' in '${re}'`);

		} else if (c in precedence) {
			while (stack.length > 0 && stack[stack.length - 1] !== OPEN && precedence[stack[stack.length - 1]] >= precedence[c])
				output += stack.pop();
			stack.push(c);

		} else {
			output += c;
		}
	}

	while (stack.length > 0) {
		const op = stack.pop();
		if (op === OPEN)
			throw new MalformedDescription(`missing '${CLOSE}' in '${re}'`);
		output += op;
	}
	return output;
}
