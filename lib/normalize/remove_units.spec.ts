import 'mocha'
import { expect } from 'chai'

import { EPSILON } from '../grammar'
import { grammar_of, lines_of } from '../../test/helpers'
import { remove_units, unit_pairs, is_unit } from './remove_units'

function without_units(source: string) {
	const grammar = grammar_of(source)
	remove_units(grammar)
	return lines_of(grammar)
}

describe('is_unit', () => it('works', () => {
	const grammar = grammar_of('S0 -> S | ε\nS -> a | AB\nA -> a\nB -> b')
	expect(is_unit(grammar, ['S'])).true
	expect(is_unit(grammar, ['a'])).false
	expect(is_unit(grammar, [EPSILON])).false
	expect(is_unit(grammar, ['A', 'B'])).false
}))

describe('unit_pairs', () => it('works', () => {
	const grammar = grammar_of('A -> B | a | C\nB -> C\nC -> c')
	expect(unit_pairs(grammar)).eql([['A', 'B'], ['A', 'C'], ['B', 'C']])
}))

describe('remove_units', () => {
	it('inlines through chains', () => {
		expect(without_units('A -> B\nB -> C\nC -> a')).eql([
			'A → a',
			'B → a',
			'C → a',
		])
	})

	it('loses nothing around a three variable cycle', () => {
		expect(without_units('A -> B | a\nB -> C | b\nC -> A | c')).eql([
			'A → a|b|c',
			'B → b|c|a',
			'C → c|a|b',
		])
	})

	it('drops self loops', () => {
		expect(without_units('A -> A | a')).eql([
			'A → a',
		])
		expect(without_units('A -> A | B\nB -> b')).eql([
			'A → b',
			'B → b',
		])
	})

	it('keeps the order of the remaining productions', () => {
		expect(without_units('S -> aB | B | c\nB -> bB | b')).eql([
			'S → aB|c|bB|b',
			'B → bB|b',
		])
	})
})
