import { EPSILON, letter } from './types';
import { EMPTY } from './parse';

//-----------------------------------------------------------------------------
// Regex AST
//-----------------------------------------------------------------------------

export interface empty {
	type: 'empty';
}
export interface epsilon {
	type: 'epsilon';
}
export interface alternation {
	type: 'alt';
	parts: part[];
}
export interface star {
	type: 'star';
	part: part;
}

type _part = empty | epsilon | alternation | star;
// a string is one alphabet symbol; an array is a concatenation
export type part = letter | part[] | _part;

export const empty:		empty	= {type: 'empty'};
export const epsilon:	epsilon	= {type: 'epsilon'};

function type(part: part) {
	return typeof part === 'string'	? 'symbol'
			: Array.isArray(part)	? 'concat'
			: part.type;
}

function is<T extends _part['type']|'symbol'|'concat'>(part: part, istype: T): part is (T extends 'symbol' ? string : T extends 'concat' ? part[] : Extract<_part, { type: T }>) {
	return type(part) === istype;
}

// Does the expression match the empty string
export function nullable(part: part): boolean {
	if (typeof part === 'string')
		return false;
	if (Array.isArray(part))
		return part.every(nullable);

	switch (part.type) {
		case 'empty':	return false;
		case 'epsilon':	return true;
		case 'star':	return true;
		case 'alt':		return part.parts.some(nullable);
	}
}

//-----------------------------------------------------------------------------
// Simplifying constructors
//-----------------------------------------------------------------------------

export function concatenation(...parts: part[]): part {
	const flat: part[] = [];
	for (const p of parts) {
		if (is(p, 'empty'))
			return empty;
		if (is(p, 'concat'))
			flat.push(...p);
		else if (!is(p, 'epsilon'))
			flat.push(p);
	}
	return flat.length === 0 ? epsilon
		: flat.length === 1 ? flat[0]
		: flat;
}

export function alternation(...parts: part[]): part {
	const unique = new Map<string, part>();
	for (const p of parts) {
		for (const q of is(p, 'alt') ? p.parts : [p]) {
			const key = toString(q);
			if (!is(q, 'empty') && !unique.has(key))
				unique.set(key, q);
		}
	}

	let list = [...unique.values()];
	// ε is redundant beside an alternative that already matches the empty string
	if (list.some(p => is(p, 'epsilon')) && list.some(p => !is(p, 'epsilon') && nullable(p)))
		list = list.filter(p => !is(p, 'epsilon'));

	return list.length === 0 ? empty
		: list.length === 1 ? list[0]
		: {type: 'alt', parts: list};
}

export function star(part: part): part {
	if (is(part, 'empty') || is(part, 'epsilon'))
		return epsilon;
	if (is(part, 'star'))
		return part;
	// (ε|x)* = x*, (x*|y)* = (x|y)*
	if (is(part, 'alt') && part.parts.some(p => is(p, 'epsilon') || is(p, 'star')))
		return star(alternation(...part.parts.filter(p => !is(p, 'epsilon')).map(p => is(p, 'star') ? p.part : p)));
	return {type: 'star', part};
}

//-----------------------------------------------------------------------------
// Printing
//-----------------------------------------------------------------------------

function grouped(part: part, when: boolean): string {
	const s = toString(part);
	return when ? `(${s})` : s;
}

export function toString(part: part): string {
	if (typeof part === 'string')
		return part;

	if (Array.isArray(part))
		return part.map(p => grouped(p, is(p, 'alt') || (typeof p === 'string' && [...p].length > 1))).join('');

	switch (part.type) {
		case 'empty':	return EMPTY;
		case 'epsilon':	return EPSILON;
		case 'alt':		return part.parts.map(toString).join('|');
		case 'star':	return grouped(part.part, !(typeof part.part === 'string' && [...part.part].length === 1)) + '*';
	}
}
