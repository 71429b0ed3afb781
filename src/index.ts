export * from './errors';
export * from './types';
export { NFA } from './nfa';
export type { NFADescription } from './nfa';
export { DFA, ACCEPT, REJECT } from './dfa';
export type { DFADescription } from './dfa';
export { Mealy } from './mealy';
export type { MealyDescription, MealyEdge, MealyTransition } from './mealy';
export { Moore } from './moore';
export type { MooreDescription } from './moore';
export { mealyToMoore, mooreToMealy, mealyAcceptor } from './transform';
export { minimizeMoore, minimizeMealy } from './minimize';
export type { MinimizeOptions } from './minimize';
export { preprocess, toPostfix, EMPTY } from './parse';
export { ThompsonBuilder, regexToNFA } from './thompson';
export { empty, epsilon, alternation, concatenation, star, nullable, toString } from './regex';
export type { part } from './regex';
export { eliminate, toRegex } from './eliminate';
export { asyncProduct, tupleName } from './product';
export { LinearAutomaton, linearAutomaton, bitVectors } from './linear';
export type { LinearOptions } from './linear';
export { parseMealy, parseMoore, parseNetworkAutomaton } from './description';
