import { DFA } from './dfa';
import { MalformedDescription } from './errors';
import { Mealy, MealyEdge } from './mealy';
import { Moore } from './moore';
import { Edge, letter, state } from './types';

/*
Text descriptions

Mealy / Moore machines:

	STATES: a0, a1
	INPUTS: 0, 1
	OUTPUTS: y0, y1
	START_STATE: a0
	MARKING: a0:y0, a1:y1		(Moore only, optional)
	TRANSITIONS:
	a0, 0: a1/y0				(Mealy: state, input: next/output)
	a0, 0: a1					(Moore: state, input: next)

Network elements (values on the same line as the key, or on the lines after it):

	states: q0, q1
	alphabet: a
	initial: q0
	final: q1
	transitions:
	q0, a, q1

Blank lines and lines starting with # are ignored.
*/

interface Line {
	text:	string;
	number:	number;
}

function contentLines(text: string): Line[] {
	return text.split(/\r?\n/)
		.map((raw, i) => ({text: raw.trim(), number: i + 1}))
		.filter(line => line.text && !line.text.startsWith('#'));
}

function list(text: string): string[] {
	return text.split(',').map(x => x.trim()).filter(Boolean);
}

function splitOnce(text: string, sep: string): [string, string] | undefined {
	const i = text.indexOf(sep);
	return i < 0 ? undefined : [text.slice(0, i).trim(), text.slice(i + sep.length).trim()];
}

function bad(line: Line, expected: string): never {
	throw new MalformedDescription(`line ${line.number}: expected '${expected}', got '${line.text}'`);
}

//-----------------------------------------------------------------------------
//	Mealy / Moore
//-----------------------------------------------------------------------------

const TRANSITIONS = 'TRANSITIONS';

interface MachineText {
	header:			Map<string, string>;
	transitions:	Line[];
}

function readMachine(text: string, keys: readonly string[]): MachineText {
	const header		= new Map<string, string>();
	const transitions:	Line[] = [];
	let inTransitions	= false;

	for (const line of contentLines(text)) {
		const key = [...keys, TRANSITIONS].find(k => line.text.startsWith(`${k}:`));
		if (key === TRANSITIONS) {
			inTransitions = true;
			const rest = line.text.slice(key.length + 1).trim();
			if (rest)
				transitions.push({text: rest, number: line.number});
		} else if (key) {
			header.set(key, line.text.slice(key.length + 1).trim());
		} else if (inTransitions) {
			transitions.push(line);
		} else {
			throw new MalformedDescription(`line ${line.number}: unexpected '${line.text}'`);
		}
	}
	return {header, transitions};
}

function required(m: MachineText, key: string): string {
	const value = m.header.get(key);
	if (value === undefined)
		throw new MalformedDescription(`missing ${key}: section`);
	return value;
}

export function parseMealy(text: string): Mealy {
	const m = readMachine(text, ['STATES', 'INPUTS', 'OUTPUTS', 'START_STATE']);

	const transitions = m.transitions.map((line): MealyEdge => {
		const [key, result]	= splitOnce(line.text, ':') ?? bad(line, 'state, input: next/output');
		const [from, input]	= splitOnce(key, ',') ?? bad(line, 'state, input: next/output');
		const [to, output]	= splitOnce(result, '/') ?? bad(line, 'state, input: next/output');
		return {from, input, to, output};
	});

	return Mealy.from({
		states:		list(required(m, 'STATES')),
		inputs:		list(required(m, 'INPUTS')),
		outputs:	list(required(m, 'OUTPUTS')),
		start:		required(m, 'START_STATE'),
		transitions,
	});
}

export function parseMoore(text: string): Moore {
	const m = readMachine(text, ['STATES', 'INPUTS', 'OUTPUTS', 'START_STATE', 'MARKING']);

	const transitions = m.transitions.map((line): Edge => {
		const [key, to]		= splitOnce(line.text, ':') ?? bad(line, 'state, input: next');
		const [from, input]	= splitOnce(key, ',') ?? bad(line, 'state, input: next');
		return {from, input, to};
	});

	const marking = list(m.header.get('MARKING') ?? '').map((pair): [state, letter] => {
		const split = splitOnce(pair, ':');
		if (!split)
			throw new MalformedDescription(`bad marking '${pair}', expected 'state:output'`);
		return split;
	});

	return Moore.from({
		states:		list(required(m, 'STATES')),
		inputs:		list(required(m, 'INPUTS')),
		outputs:	list(required(m, 'OUTPUTS')),
		start:		required(m, 'START_STATE'),
		marking:	Object.fromEntries(marking),
		transitions,
	});
}

//-----------------------------------------------------------------------------
//	Network element
//-----------------------------------------------------------------------------

const NETWORK_KEYS = ['states', 'alphabet', 'initial', 'final', 'transitions'];

export function parseNetworkAutomaton(text: string): DFA {
	const sections = new Map<string, Line[]>();
	let current: Line[] | undefined;

	for (const line of contentLines(text)) {
		const split = splitOnce(line.text, ':');
		if (split) {
			const [key, rest] = split;
			if (!NETWORK_KEYS.includes(key))
				throw new MalformedDescription(`line ${line.number}: unknown section '${key}'`);
			current = sections.get(key) ?? [];
			sections.set(key, current);
			if (rest)
				current.push({text: rest, number: line.number});
		} else if (current) {
			current.push(line);
		} else {
			throw new MalformedDescription(`line ${line.number}: unexpected '${line.text}'`);
		}
	}

	const section = (key: string) => {
		const lines = sections.get(key);
		if (!lines)
			throw new MalformedDescription(`missing ${key}: section`);
		return lines;
	};
	const values = (lines: Line[]) => [...new Set(lines.flatMap(line => list(line.text)))];

	const initial = values(section('initial'));
	if (initial.length !== 1)
		throw new MalformedDescription(`expected one initial state, got ${initial.length}`);

	const transitions = (sections.get('transitions') ?? []).map((line): Edge => {
		const parts = list(line.text);
		if (parts.length !== 3)
			bad(line, 'state, symbol, next');
		const [from, input, to] = parts;
		return {from, input, to};
	});

	return DFA.from({
		states:		values(section('states')),
		alphabet:	values(section('alphabet')),
		start:		initial[0],
		finals:		values(sections.get('final') ?? []),
		transitions,
	});
}
